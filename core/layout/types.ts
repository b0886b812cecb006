/**
 * Layout tables produced by the line breaker and consumed by the cursor,
 * viewport and renderers. Layouts are values: passes that adjust them
 * (justify, align) return new tables.
 */

/** One code point of the text, or the trailing sentinel (glyph ''). */
export interface CharCell {
  /** Wrapped row, 0-based. */
  readonly row: number;
  /** Column within the row, 0-based. */
  readonly col: number;
  /** Left edge in layout pixels; also the caret x before this cell. */
  readonly xStart: number;
  /** Right edge in layout pixels. */
  readonly xEnd: number;
  readonly glyph: string;
}

/** Inclusive range of cell indices owned by one row. */
export interface Section {
  readonly first: number;
  readonly last: number;
}

export interface TextLayout {
  /** One cell per code point plus the sentinel; length is N + 1. */
  readonly chars: readonly CharCell[];
  /** One section per row. */
  readonly sections: readonly Section[];
  /** Rendered text of each row; hard breaks keep their trailing '\n'. */
  readonly lines: readonly string[];
}

export function isSpace(glyph: string): boolean {
  return glyph === ' ';
}

/** Index of the sentinel cell (the caret position after the last character). */
export function endPosition(layout: TextLayout): number {
  return layout.chars.length - 1;
}

/**
 * Index of the last cell in a row that is drawn: skips a trailing newline
 * and trailing spaces. Returns -1 for a row with nothing visible.
 */
export function lastVisibleIndex(layout: TextLayout, row: number): number {
  const section = layout.sections[row];
  for (let i = section.last; i >= section.first; i--) {
    const glyph = layout.chars[i].glyph;
    if (glyph !== '' && glyph !== '\n' && !isSpace(glyph)) return i;
  }
  return -1;
}

/** Right edge of the drawn part of a row (0 for an empty row). */
export function rowVisibleWidth(layout: TextLayout, row: number): number {
  const index = lastVisibleIndex(layout, row);
  return index === -1 ? 0 : layout.chars[index].xEnd;
}

/** Whether the row was closed by a newline in the text. */
export function endsWithHardBreak(layout: TextLayout, row: number): boolean {
  return layout.chars[layout.sections[row].last].glyph === '\n';
}
