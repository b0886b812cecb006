/**
 * Justification: widen inter-word gaps with whole space characters so each
 * row's drawn text ends as close to the right edge as a space allows.
 *
 * Skipped rows: the last row, rows closed by a newline (paragraph ends)
 * and rows without an interior gap (a single long word). A gap is a run
 * of spaces with a non-space cell on both sides, so leading indentation
 * and the trailing break space never receive width.
 */

import type { FontMetrics } from '../../native/font-metrics';
import { toCodePoints } from '../text/codepoints';
import {
  type CharCell,
  type TextLayout,
  endsWithHardBreak,
  isSpace,
  lastVisibleIndex,
} from './types';

/** How one row was stretched. */
export interface RowJustification {
  row: number;
  /** Space characters distributed over the row. */
  extra: number;
  /** Spaces added at each gap, left to right. Sums to `extra`. */
  shares: number[];
  /** Pixel advance of one added space. */
  spaceAdvance: number;
}

export interface JustifyResult {
  layout: TextLayout;
  rows: RowJustification[];
}

export function justifyLayout(
  layout: TextLayout,
  metrics: FontMetrics,
  maxWidth: number,
  letterSpacing: number = 0,
): JustifyResult {
  const spaceAdvance = metrics.advanceX('  ') - metrics.advanceX(' ') + letterSpacing;
  if (spaceAdvance <= 0) return { layout, rows: [] };
  const chars: CharCell[] = [...layout.chars];
  const lines: string[] = [...layout.lines];
  const rows: RowJustification[] = [];

  for (let row = 0; row < layout.sections.length - 1; row++) {
    if (endsWithHardBreak(layout, row)) continue;
    const visible = lastVisibleIndex(layout, row);
    if (visible === -1) continue;

    const extra = Math.floor((maxWidth - chars[visible].xEnd) / spaceAdvance);
    if (extra <= 0) continue;

    const { first, last } = layout.sections[row];
    const gapEnds = findGapEnds(chars, first, visible);
    if (gapEnds.length === 0) continue;

    const base = Math.floor(extra / gapEnds.length);
    const remainder = extra % gapEnds.length;
    const shares = gapEnds.map((_, g) => base + (g < remainder ? 1 : 0));
    const shareAt = new Map<number, number>();
    gapEnds.forEach((index, g) => shareAt.set(index, shares[g]));

    let shift = 0;
    for (let i = first; i <= last; i++) {
      const cell = chars[i];
      const xStart = cell.xStart + shift;
      shift += (shareAt.get(i) ?? 0) * spaceAdvance;
      chars[i] = { ...cell, xStart, xEnd: cell.xEnd + shift };
    }

    lines[row] = padGaps(lines[row], first, shareAt);
    rows.push({ row, extra, shares, spaceAdvance });
  }

  return { layout: { chars, sections: layout.sections, lines }, rows };
}

/** Index of the last space of every interior gap in [first, visible]. */
function findGapEnds(chars: readonly CharCell[], first: number, visible: number): number[] {
  const ends: number[] = [];
  for (let i = first + 1; i < visible; i++) {
    if (!isSpace(chars[i].glyph) || isSpace(chars[i + 1].glyph)) continue;
    let start = i;
    while (start > first && isSpace(chars[start - 1].glyph)) start--;
    if (start > first) ends.push(i);
  }
  return ends;
}

/** Widen the rendered row string by each gap's share of spaces. */
function padGaps(line: string, first: number, shareAt: ReadonlyMap<number, number>): string {
  let result = '';
  toCodePoints(line).forEach((glyph, offset) => {
    result += glyph;
    const share = shareAt.get(first + offset);
    if (share !== undefined) result += ' '.repeat(share);
  });
  return result;
}
