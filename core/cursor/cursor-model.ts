/**
 * Caret and selection over a wrapped layout.
 *
 * The caret is a cell index in [0, N]; index N is the sentinel after the
 * last character. Vertical moves remember the caret's pixel x (the sticky
 * column) so that moving through a short row and back lands in the
 * original column. Any other move or an explicit set forgets it.
 */

import type { TextLayout } from '../layout/types';
import { endPosition } from '../layout/types';
import { type Selection, isSelectionEmpty } from './selection';

export type CursorDirection =
  | 'left' | 'right' | 'up' | 'down'
  | 'home' | 'end'
  | 'pageUp' | 'pageDown';

export interface CaretPoint {
  /** Caret x in layout pixels. */
  x: number;
  /** Top of the caret's row in layout pixels. */
  y: number;
  row: number;
}

export class CursorModel {
  private _layout: TextLayout;
  private _lineHeight: number;
  private _position: number = 0;
  private _selection: Selection = { anchor: 0, moving: 0 };
  private _stickyX: number | null = null;
  private pageRows: number = 1;

  constructor(layout: TextLayout, lineHeight: number) {
    this._layout = layout;
    this._lineHeight = lineHeight;
  }

  get position(): number {
    return this._position;
  }

  get selection(): Readonly<Selection> {
    return this._selection;
  }

  get hasSelection(): boolean {
    return !isSelectionEmpty(this._selection);
  }

  get stickyX(): number | null {
    return this._stickyX;
  }

  get layout(): TextLayout {
    return this._layout;
  }

  get lineHeight(): number {
    return this._lineHeight;
  }

  /** Swap in a regenerated layout, keeping caret and selection in range. */
  setLayout(layout: TextLayout): void {
    this._layout = layout;
    this._position = this.clamp(this._position);
    this._selection = {
      anchor: this.clamp(this._selection.anchor),
      moving: this.clamp(this._selection.moving),
    };
  }

  setLineHeight(lineHeight: number): void {
    this._lineHeight = lineHeight;
  }

  /** Rows moved by pageUp/pageDown. */
  setPageSize(rows: number): void {
    this.pageRows = Math.max(1, Math.floor(rows));
  }

  /**
   * Cell index under a point in layout pixels, or null when the point is
   * above or below every row.
   */
  hitTest(x: number, y: number): number | null {
    const row = Math.floor(y / this._lineHeight);
    if (row < 0 || row >= this._layout.sections.length) return null;
    return this.findInRow(row, x);
  }

  /**
   * Nearest caret slot to x within a row: the first cell whose right edge
   * lies past x, or the slot after it when x is past the cell's midpoint.
   * Never leaves the row: past the end it is the row's last index.
   */
  findInRow(row: number, x: number): number {
    const { first, last } = this._layout.sections[row];
    for (let i = first; i <= last; i++) {
      const cell = this._layout.chars[i];
      if (x < cell.xEnd) {
        return Math.min(x < 0.5 * (cell.xStart + cell.xEnd) ? i : i + 1, last);
      }
    }
    return last;
  }

  /** Move the caret; with extend the selection grows from the old caret. */
  move(direction: CursorDirection, extend: boolean): void {
    const from = this._position;
    const sticky = this._stickyX;
    this._stickyX = null;

    const anchor = extend && isSelectionEmpty(this._selection) ? from : this._selection.anchor;
    const target = this.resolveTarget(direction, from, sticky);

    this._position = target;
    this._selection = extend ? { anchor, moving: target } : { anchor: target, moving: target };
  }

  /** Place the caret explicitly. */
  setPosition(position: number, extend: boolean = false): void {
    const target = this.clamp(position);
    const anchor = extend && isSelectionEmpty(this._selection) ? this._position : this._selection.anchor;
    this._stickyX = null;
    this._position = target;
    this._selection = extend ? { anchor, moving: target } : { anchor: target, moving: target };
  }

  /** Store a selection as given; consumers normalize it. */
  setSelection(anchor: number, moving: number): void {
    this._selection = { anchor: this.clamp(anchor), moving: this.clamp(moving) };
  }

  selectAll(): void {
    this._selection = { anchor: 0, moving: endPosition(this._layout) };
  }

  clearStickyColumn(): void {
    this._stickyX = null;
  }

  /** Pixel position of the caret in layout coordinates. */
  caretPoint(): CaretPoint {
    const cell = this._layout.chars[this._position];
    return { x: cell.xStart, y: cell.row * this._lineHeight, row: cell.row };
  }

  private resolveTarget(direction: CursorDirection, from: number, sticky: number | null): number {
    const { chars, sections } = this._layout;
    const row = chars[from].row;

    switch (direction) {
      case 'left':
        return Math.max(from - 1, 0);
      case 'right':
        return Math.min(from + 1, endPosition(this._layout));
      case 'home':
        return sections[row].first;
      case 'end':
        return sections[row].last;
      case 'up':
      case 'down':
      case 'pageUp':
      case 'pageDown': {
        const x = sticky ?? chars[from].xStart;
        this._stickyX = x;
        const step = direction === 'up' || direction === 'down' ? 1 : this.pageRows;
        const delta = direction === 'up' || direction === 'pageUp' ? -step : step;
        const targetRow = Math.max(0, Math.min(row + delta, sections.length - 1));
        return this.findInRow(targetRow, x);
      }
    }
  }

  private clamp(position: number): number {
    return Math.max(0, Math.min(position, endPosition(this._layout)));
  }
}
