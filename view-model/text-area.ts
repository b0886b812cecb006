/**
 * TextArea: one editable (or read-only, scrollable) block of text.
 *
 * Owns the text and options, the wrapped layout, the caret and selection,
 * the undo history and the scroll state. Every text change goes through
 * commit(), which records history, regenerates the layout and reveals the
 * caret. Input routing and focus live in EditorSession; a TextArea never
 * refers back to the session.
 */

import type { FontMetrics } from '../native/font-metrics';
import { alignLayout } from '../core/layout/align';
import { wrapLines } from '../core/layout/line-breaker';
import { type TextLayout, endPosition, rowVisibleWidth } from '../core/layout/types';
import { CursorModel, type CursorDirection } from '../core/cursor/cursor-model';
import {
  type Rect,
  type Selection,
  type SelectionRange,
  normalizeSelection,
  selectionRects,
} from '../core/cursor/selection';
import { type HistoryEntry, HistoryManager } from '../core/history/history-manager';
import { ViewportController, type Sliders } from '../core/viewport/viewport-controller';
import type { Clipboard } from '../core/commands/clipboard';
import {
  codePointLength,
  insertAt,
  removeRange,
  sliceCodePoints,
  toCodePoints,
} from '../core/text/codepoints';
import { type RenderedLine, computeRenderedLines } from './line-layout';
import { DEFAULT_OPTIONS, type TextAreaOptions, mergeOptions, validateOptions } from './options';

type TextChangeListener = (text: string) => void;

export class TextArea {
  readonly cursor: CursorModel;
  readonly history: HistoryManager;
  readonly viewport: ViewportController;

  private readonly metrics: FontMetrics;
  private _options: TextAreaOptions;
  private _layout: TextLayout;
  private _lineHeight: number = 0;
  /** Top of the sample's ink box relative to the baseline (negative). */
  private _lineTop: number = 0;
  private _contentWidth: number = 0;
  private _contentHeight: number = 0;
  private _listeners: TextChangeListener[] = [];

  constructor(metrics: FontMetrics, options?: Partial<TextAreaOptions>) {
    const merged = mergeOptions(DEFAULT_OPTIONS, options);
    validateOptions(merged);

    this.metrics = metrics;
    this._options = merged;
    this._layout = this.computeLayout();
    this.cursor = new CursorModel(this._layout, this._lineHeight);
    this.history = new HistoryManager(merged.undoLevels, merged.text);
    this.viewport = new ViewportController();
    this.syncGeometry();
  }

  // === State ===

  get options(): Readonly<TextAreaOptions> {
    return this._options;
  }

  get text(): string {
    return this._options.text;
  }

  get layout(): TextLayout {
    return this._layout;
  }

  get lineHeight(): number {
    return this._lineHeight;
  }

  get contentWidth(): number {
    return this._contentWidth;
  }

  get contentHeight(): number {
    return this._contentHeight;
  }

  get caret(): number {
    return this.cursor.position;
  }

  get selection(): Readonly<Selection> {
    return this.cursor.selection;
  }

  get hasSelection(): boolean {
    return this.cursor.hasSelection;
  }

  get selectedText(): string {
    if (!this.cursor.hasSelection) return '';
    const { start, end } = normalizeSelection(this.cursor.selection);
    return sliceCodePoints(this.text, start, end);
  }

  /** Subscribe to text changes (edits, undo/redo, update). */
  onChange(listener: TextChangeListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx !== -1) this._listeners.splice(idx, 1);
    };
  }

  /**
   * Change any subset of options. The merged options are validated before
   * anything is applied, so a rejected update leaves the area as it was.
   * A text change is recorded in history; a new undoLevels starts the
   * history over from the current text.
   */
  update(options: Partial<TextAreaOptions>): void {
    const next = mergeOptions(this._options, options);
    validateOptions(next);

    const previous = this._options;
    this._options = next;

    if (next.undoLevels !== previous.undoLevels) {
      this.history.reset(next.text, next.undoLevels);
    } else if (next.text !== previous.text) {
      this.history.record(next.text, this.cursor.position);
    }

    this.relayout();
    if (next.text !== previous.text) this.notifyChange();
  }

  // === Editing ===

  /**
   * Insert text at the caret, replacing the selection if there is one.
   * Rejected without any state change when the result would exceed
   * maxChars.
   *
   * @returns Whether the text was inserted.
   */
  insertText(text: string): boolean {
    const { start, end } = this.editRange();
    return this.replaceRange(start, end, text, start + codePointLength(text));
  }

  deleteBackward(): boolean {
    if (this.cursor.hasSelection) return this.deleteSelection();
    const pos = this.cursor.position;
    if (pos === 0) return false;
    return this.replaceRange(pos - 1, pos, '', pos - 1);
  }

  deleteForward(): boolean {
    if (this.cursor.hasSelection) return this.deleteSelection();
    const pos = this.cursor.position;
    if (pos >= endPosition(this._layout)) return false;
    return this.replaceRange(pos, pos + 1, '', pos);
  }

  deleteSelection(): boolean {
    if (!this.cursor.hasSelection) return false;
    const { start, end } = normalizeSelection(this.cursor.selection);
    return this.replaceRange(start, end, '', start);
  }

  /**
   * With a selection, insert a copy of it right after it and put the caret
   * after the copy. Without one, repeat the caret's paragraph below itself
   * and leave the caret where it is.
   */
  duplicate(): boolean {
    if (this.cursor.hasSelection) {
      const { end } = normalizeSelection(this.cursor.selection);
      const copy = this.selectedText;
      return this.replaceRange(end, end, copy, end + codePointLength(copy));
    }

    const cps = toCodePoints(this.text);
    const pos = this.cursor.position;
    let paragraphStart = pos;
    while (paragraphStart > 0 && cps[paragraphStart - 1] !== '\n') paragraphStart--;
    let paragraphEnd = pos;
    while (paragraphEnd < cps.length && cps[paragraphEnd] !== '\n') paragraphEnd++;

    const paragraph = cps.slice(paragraphStart, paragraphEnd).join('');
    return this.replaceRange(paragraphEnd, paragraphEnd, '\n' + paragraph, pos);
  }

  selectAll(): void {
    this.cursor.selectAll();
  }

  /** @returns Whether anything was copied (false without a selection). */
  copy(clipboard: Clipboard): boolean {
    if (!this.cursor.hasSelection) return false;
    clipboard.write(this.selectedText);
    return true;
  }

  cut(clipboard: Clipboard): boolean {
    if (!this.copy(clipboard)) return false;
    return this.deleteSelection();
  }

  paste(clipboard: Clipboard): boolean {
    const text = clipboard.read();
    if (text === '') return false;
    return this.insertText(text);
  }

  undo(): boolean {
    return this.restore(this.history.undo(this.cursor.position));
  }

  redo(): boolean {
    return this.restore(this.history.redo(this.cursor.position));
  }

  // === Caret and selection ===

  moveCaret(direction: CursorDirection, extend: boolean = false): void {
    this.cursor.move(direction, extend);
    this.revealCaret();
  }

  setCaret(position: number, extend: boolean = false): void {
    this.cursor.setPosition(position, extend);
    this.revealCaret();
  }

  setSelection(anchor: number, moving: number): void {
    this.cursor.setSelection(anchor, moving);
  }

  /** Caret index under a point in viewport coordinates, or null on a miss. */
  caretFromPoint(x: number, y: number): number | null {
    return this.cursor.hitTest(x + this.viewport.offsetX, y + this.viewport.offsetY);
  }

  /** Whether a viewport-coordinate point lies inside the visible window. */
  containsPoint(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x <= this.viewport.viewportWidth && y <= this.viewport.viewportHeight;
  }

  // === Scrolling ===

  scrollBy(deltaX: number, deltaY: number): void {
    this.viewport.scrollBy(deltaX, deltaY);
  }

  /** Scroll to an anchor, over `frames` ticks when frames > 0. */
  scrollTo(x: number, y: number, frames: number = 0): void {
    this.viewport.animateTo(x, y, frames);
  }

  // === Projection ===

  get renderedLines(): RenderedLine[] {
    const { color, colors } = this._options;
    return computeRenderedLines(this._layout, this._lineHeight, this._lineTop, color, colors);
  }

  /** Caret box in layout coordinates. */
  get caretRect(): Rect {
    const point = this.cursor.caretPoint();
    return {
      x: point.x,
      y: point.y,
      width: this._options.caretWidth,
      height: this._lineHeight - this._options.lineSpacing,
    };
  }

  get selectionRects(): Rect[] {
    return selectionRects(this._layout, this.cursor.selection, this._lineHeight);
  }

  get sliders(): Sliders {
    return this.viewport.sliders(this._options.sliderWidth);
  }

  // === Internals ===

  /** Selection range, or the caret as an empty range. */
  private editRange(): SelectionRange {
    if (this.cursor.hasSelection) return normalizeSelection(this.cursor.selection);
    const pos = this.cursor.position;
    return { start: pos, end: pos };
  }

  private replaceRange(start: number, end: number, insert: string, caret: number): boolean {
    const next = insertAt(removeRange(this.text, start, end), start, insert);
    const { maxChars } = this._options;
    if (maxChars !== null && codePointLength(next) > maxChars) return false;
    this.commit(next, caret);
    return true;
  }

  private commit(text: string, caret: number): void {
    const changed = text !== this.text;
    if (changed) {
      this.history.record(text, this.cursor.position);
      this._options = { ...this._options, text };
      this.relayout();
    }
    this.cursor.setPosition(caret);
    this.revealCaret();
    if (changed) this.notifyChange();
  }

  private restore(entry: Readonly<HistoryEntry> | null): boolean {
    if (!entry) return false;
    const changed = entry.text !== this.text;
    this._options = { ...this._options, text: entry.text };
    this.relayout();
    this.cursor.setPosition(entry.caret ?? this.cursor.position);
    this.revealCaret();
    if (changed) this.notifyChange();
    return true;
  }

  private relayout(): void {
    this._layout = this.computeLayout();
    this.cursor.setLayout(this._layout);
    this.syncGeometry();
  }

  /** Wrap and align the text; also refreshes the line box and content size. */
  private computeLayout(): TextLayout {
    const o = this._options;
    const sample = this.metrics.measureBounds(o.sample);
    this._lineHeight = sample.height + o.lineSpacing;
    this._lineTop = sample.y;

    const text = o.oneLine ? o.text.replace(/\n/g, ' ') : o.text;
    const wrapped = wrapLines(this.metrics, text, {
      letterSpacing: o.letterSpacing,
      maxWidth: o.oneLine || o.width === null ? Infinity : o.width,
      maxChars: o.wrapColumn ?? Infinity,
      wholeWords: o.wholeWords,
    });
    const layout = alignLayout(wrapped, o.align, o.width, this.metrics, o.letterSpacing);

    if (o.oneLine) {
      this._contentWidth = layout.chars[endPosition(layout)].xEnd + o.caretWidth;
    } else {
      let widest = 0;
      for (let row = 0; row < layout.sections.length; row++) {
        widest = Math.max(widest, rowVisibleWidth(layout, row));
      }
      this._contentWidth = widest;
    }
    this._contentHeight = layout.sections.length * this._lineHeight;
    return layout;
  }

  /** Push line metrics and sizes into the cursor and viewport. */
  private syncGeometry(): void {
    const o = this._options;
    this.cursor.setLineHeight(this._lineHeight);
    this.viewport.setLineHeight(this._lineHeight);
    this.viewport.setCaretWidth(o.caretWidth);
    this.viewport.setValign(o.valign);
    this.viewport.setViewport(o.width ?? this._contentWidth, o.height ?? this._contentHeight);
    this.viewport.setContent(this._contentWidth, this._contentHeight);
    if (o.height !== null && this._lineHeight > 0) {
      this.cursor.setPageSize(o.height / this._lineHeight);
    }
  }

  private revealCaret(): void {
    if (this._options.width === null || this._options.height === null) return;
    const point = this.cursor.caretPoint();
    this.viewport.revealCaret(point.x, point.y);
  }

  private notifyChange(): void {
    for (const listener of this._listeners) listener(this.text);
  }
}
