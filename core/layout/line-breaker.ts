/**
 * Line breaking: turns text into the cell table, row sections and wrapped
 * line strings.
 *
 * Breaking rules, applied per code point:
 * 1. A newline closes the row (the row string keeps the '\n').
 * 2. A character that would push the row past maxWidth (or past maxChars
 *    code points) starts a new row. With wholeWords the break moves back
 *    to the last space in the row and the word fragment after it is
 *    carried down; a space that overflows hangs at the end of its row.
 * 3. The first character of a row is always placed, so a token wider
 *    than the row still lays out (overfull) instead of looping.
 */

import type { FontMetrics } from '../../native/font-metrics';
import { toCodePoints } from '../text/codepoints';
import { type CharCell, type Section, type TextLayout, isSpace } from './types';

export interface WrapOptions {
  /** Extra pixels added after every character. */
  letterSpacing: number;
  /** Row width limit in pixels. Infinity disables width wrapping. */
  maxWidth: number;
  /** Row length limit in code points. Infinity disables it. */
  maxChars: number;
  /** Break only at spaces unless a single word overflows the row. */
  wholeWords: boolean;
}

const DEFAULT_WRAP_OPTIONS: WrapOptions = {
  letterSpacing: 0,
  maxWidth: Infinity,
  maxChars: Infinity,
  wholeWords: false,
};

export function wrapLines(
  metrics: FontMetrics,
  text: string,
  options?: Partial<WrapOptions>,
): TextLayout {
  const { letterSpacing, maxWidth, maxChars, wholeWords } = { ...DEFAULT_WRAP_OPTIONS, ...options };
  const measure = (line: string, count: number): number =>
    metrics.measureBounds(line).width + letterSpacing * count;

  const cps = toCodePoints(text);
  const chars: CharCell[] = [];
  const sections: Section[] = [];
  const lines: string[] = [];

  let row = 0;
  let rowStart = 0;
  let line = '';
  let lineCount = 0;

  const closeRow = (last: number, rendered: string): void => {
    lines.push(rendered);
    sections.push({ first: rowStart, last });
    row++;
    rowStart = last + 1;
    line = '';
    lineCount = 0;
  };

  for (let n = 0; n < cps.length; n++) {
    const glyph = cps[n];

    if (glyph === '\n') {
      const x = lineCount > 0 ? chars[n - 1].xEnd : 0;
      chars.push({ row, col: n - rowStart, xStart: x, xEnd: x, glyph });
      closeRow(n, line + '\n');
      continue;
    }

    const width = measure(line + glyph, lineCount + 1);
    const overflow = lineCount > 0 && (width > maxWidth || lineCount + 1 > maxChars);

    if (!overflow) {
      const x = lineCount > 0 ? chars[n - 1].xEnd : 0;
      chars.push({ row, col: n - rowStart, xStart: x, xEnd: width, glyph });
      line += glyph;
      lineCount++;
      continue;
    }

    if (wholeWords && isSpace(glyph)) {
      // The space hangs past the edge; it is not drawn, the caret can sit on it.
      chars.push({ row, col: n - rowStart, xStart: chars[n - 1].xEnd, xEnd: width, glyph });
      closeRow(n, line);
      continue;
    }

    const breakAt = wholeWords ? findBreakSpace(chars, rowStart, n - 1) : -1;

    if (breakAt !== -1) {
      closeRow(breakAt, cps.slice(rowStart, breakAt).join(''));
      // Carry the word fragment after the space down to the new row.
      const offset = rowStart < n ? chars[rowStart].xStart : 0;
      for (let p = rowStart; p < n; p++) {
        const cell = chars[p];
        chars[p] = {
          row,
          col: p - rowStart,
          xStart: cell.xStart - offset,
          xEnd: cell.xEnd - offset,
          glyph: cell.glyph,
        };
      }
      line = cps.slice(rowStart, n).join('');
      lineCount = n - rowStart;
    } else {
      closeRow(n - 1, line);
    }

    const x = lineCount > 0 ? chars[n - 1].xEnd : 0;
    chars.push({
      row,
      col: n - rowStart,
      xStart: x,
      xEnd: measure(line + glyph, lineCount + 1),
      glyph,
    });
    line += glyph;
    lineCount++;
  }

  // Sentinel: the caret slot after the last character.
  const x = lineCount > 0 ? chars[cps.length - 1].xEnd : 0;
  chars.push({ row, col: cps.length - rowStart, xStart: x, xEnd: x, glyph: '' });
  lines.push(line);
  sections.push({ first: rowStart, last: cps.length });

  return { chars, sections, lines };
}

/**
 * Last space in (first, last]. The row's first cell is never a break
 * point, since breaking there would leave an empty row behind.
 */
function findBreakSpace(chars: readonly CharCell[], first: number, last: number): number {
  for (let p = last; p > first; p--) {
    if (isSpace(chars[p].glyph)) return p;
  }
  return -1;
}
