/**
 * Horizontal alignment of a wrapped layout within a fixed width.
 */

import type { FontMetrics } from '../../native/font-metrics';
import { justifyLayout } from './justify';
import { type CharCell, type TextLayout, rowVisibleWidth } from './types';

/**
 * 'left' | 'center' | 'right' | 'justify', or a fraction in [0, 1] of the
 * free space placed before each row (0 = left, 0.5 = center, 1 = right).
 */
export type TextAlign = 'left' | 'center' | 'right' | 'justify' | number;

export function alignFraction(align: TextAlign): number {
  switch (align) {
    case 'left':
    case 'justify':
      return 0;
    case 'center':
      return 0.5;
    case 'right':
      return 1;
    default:
      return align;
  }
}

/**
 * Align every row. Without a finite width there is no free space to
 * distribute and the layout is returned as is.
 */
export function alignLayout(
  layout: TextLayout,
  align: TextAlign,
  maxWidth: number | null,
  metrics: FontMetrics,
  letterSpacing: number = 0,
): TextLayout {
  if (maxWidth === null || !Number.isFinite(maxWidth)) return layout;
  if (align === 'justify') return justifyLayout(layout, metrics, maxWidth, letterSpacing).layout;

  const fraction = alignFraction(align);
  if (fraction === 0) return layout;

  const chars: CharCell[] = [...layout.chars];
  layout.sections.forEach((section, row) => {
    const offset = fraction * (maxWidth - rowVisibleWidth(layout, row));
    for (let i = section.first; i <= section.last; i++) {
      const cell = chars[i];
      chars[i] = { ...cell, xStart: cell.xStart + offset, xEnd: cell.xEnd + offset };
    }
  });
  return { chars, sections: layout.sections, lines: layout.lines };
}

/** Left edge of a row's drawn text after alignment. */
export function rowOffset(layout: TextLayout, row: number): number {
  return layout.chars[layout.sections[row].first].xStart;
}
