/**
 * Selection representation, normalization and highlight geometry.
 *
 * A selection is an anchor (where it started) and a moving end (the
 * caret). Storage keeps them in the order they were made; consumers use
 * the normalized range, start = min(anchor, moving), end = max(...).
 */

import type { TextLayout } from '../layout/types';

export interface Selection {
  anchor: number;
  moving: number;
}

export interface SelectionRange {
  start: number;
  end: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Narrowest highlight drawn, so an empty-looking span stays visible. */
const MIN_HIGHLIGHT_WIDTH = 2;

export function normalizeSelection(selection: Selection): SelectionRange {
  return selection.anchor <= selection.moving
    ? { start: selection.anchor, end: selection.moving }
    : { start: selection.moving, end: selection.anchor };
}

export function isSelectionEmpty(selection: Selection): boolean {
  return selection.anchor === selection.moving;
}

/**
 * Highlight rectangles, one per row touched by the selection, in layout
 * pixels. The first row runs from the start caret to the row's right
 * edge, the last row from the row's left edge to the end caret.
 */
export function selectionRects(
  layout: TextLayout,
  selection: Selection,
  lineHeight: number,
): Rect[] {
  if (isSelectionEmpty(selection)) return [];
  const { chars, sections } = layout;
  const last = chars.length - 1;
  const range = normalizeSelection(selection);
  const start = Math.max(range.start, 0);
  const end = Math.min(range.end, last);

  const startRow = chars[start].row;
  const endRow = chars[end].row;
  const rects: Rect[] = [];

  for (let row = startRow; row <= endRow; row++) {
    const section = sections[row];
    const left = row === startRow ? chars[start].xStart : chars[section.first].xStart;
    const right = row === endRow ? chars[end].xStart : chars[section.last].xEnd;
    rects.push({
      x: left,
      y: row * lineHeight,
      width: Math.max(right - left, MIN_HIGHLIGHT_WIDTH),
      height: lineHeight,
    });
  }
  return rects;
}
