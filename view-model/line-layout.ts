/**
 * Compute rendered lines: one drawable string per wrapped row, with its
 * pen position and the color of the paragraph it belongs to.
 */

import { rowOffset } from '../core/layout/align';
import type { TextLayout } from '../core/layout/types';
import type { ParagraphColor } from './options';

export interface RenderedLine {
  row: number;
  /** Hard line the row belongs to, 0-based. */
  paragraph: number;
  /** Row text without its trailing newline. */
  content: string;
  /** Pen x in layout pixels. */
  x: number;
  /** Baseline y in layout pixels. */
  y: number;
  /** 0xRRGGBB, or null for the host's default text color. */
  color: number | null;
  alpha: number;
}

/**
 * @param lineTop - Top of the line box relative to the baseline (the
 *   sample's ink y, negative for text above the baseline).
 */
export function computeRenderedLines(
  layout: TextLayout,
  lineHeight: number,
  lineTop: number,
  color: number | null,
  colors: readonly ParagraphColor[] | null,
): RenderedLine[] {
  const rendered: RenderedLine[] = [];
  let paragraph = 0;

  layout.lines.forEach((line, row) => {
    const hardBreak = line.endsWith('\n');
    const paint = resolveColor(colors?.[paragraph], color);
    rendered.push({
      row,
      paragraph,
      content: hardBreak ? line.slice(0, -1) : line,
      x: rowOffset(layout, row),
      y: row * lineHeight - lineTop,
      color: paint.color,
      alpha: paint.alpha,
    });
    if (hardBreak) paragraph++;
  });

  return rendered;
}

function resolveColor(
  entry: ParagraphColor | undefined,
  fallback: number | null,
): { color: number | null; alpha: number } {
  if (entry === undefined) return { color: fallback, alpha: 1 };
  if (typeof entry === 'number') return { color: entry, alpha: 1 };
  return { color: entry.color, alpha: entry.alpha };
}
