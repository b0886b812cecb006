/**
 * Bounded undo/redo over whole-text snapshots.
 *
 * The list holds the current state plus up to `capacity` earlier states;
 * `level` indexes the active one. Behavior:
 * 1. A new edit drops every level after the active one (the redo branch).
 * 2. At capacity the oldest snapshot is evicted.
 * 3. The caret the user had just before the edit is stored on the level
 *    being left; the new level's caret stays unresolved (null) until the
 *    user leaves it, at which point the live caret is captured.
 * 4. A capacity of 0 records nothing; undo and redo do nothing.
 */

export interface HistoryEntry {
  readonly text: string;
  /** Caret to restore on arrival; null while unresolved. */
  caret: number | null;
}

export class HistoryManager {
  private entries: HistoryEntry[];
  private _level: number = 0;
  private _capacity: number;

  constructor(capacity: number, initialText: string) {
    this._capacity = Math.max(0, Math.floor(capacity));
    this.entries = [{ text: initialText, caret: null }];
  }

  /**
   * Undo steps kept. The snapshot list holds at most `capacity + 1`
   * entries: the current state and one per step.
   */
  get capacity(): number {
    return this._capacity;
  }

  /** Index of the active snapshot. */
  get level(): number {
    return this._level;
  }

  get length(): number {
    return this.entries.length;
  }

  get enabled(): boolean {
    return this._capacity > 0;
  }

  get canUndo(): boolean {
    return this.enabled && this._level > 0;
  }

  get canRedo(): boolean {
    return this.enabled && this._level < this.entries.length - 1;
  }

  /** Snapshot at a level, for inspection. */
  entryAt(level: number): Readonly<HistoryEntry> | undefined {
    return this.entries[level];
  }

  /**
   * Record a text-changing edit.
   *
   * @param newText - Text after the edit.
   * @param caretBefore - Caret position just before the edit.
   */
  record(newText: string, caretBefore: number): void {
    if (!this.enabled) return;

    this.entries.length = this._level + 1;
    if (this.entries.length > this._capacity) {
      this.entries.shift();
      this._level--;
    }
    this.entries[this._level].caret = caretBefore;
    this.entries.push({ text: newText, caret: null });
    this._level++;
  }

  /**
   * Move the active level by delta, clamped to the recorded range.
   *
   * @param liveCaret - The caret right now; captured into the newest level
   *   when leaving it backwards so a later redo returns to it exactly.
   * @returns The snapshot to restore, or null when the level is unchanged.
   */
  navigate(delta: number, liveCaret: number): Readonly<HistoryEntry> | null {
    if (!this.enabled) return null;

    const target = Math.max(0, Math.min(this._level + delta, this.entries.length - 1));
    if (target === this._level) return null;

    if (target < this._level && this._level === this.entries.length - 1) {
      this.entries[this._level].caret = liveCaret;
    }
    this._level = target;
    return this.entries[target];
  }

  undo(liveCaret: number): Readonly<HistoryEntry> | null {
    return this.navigate(-1, liveCaret);
  }

  redo(liveCaret: number): Readonly<HistoryEntry> | null {
    return this.navigate(1, liveCaret);
  }

  /** Forget everything and start over from text, optionally resizing. */
  reset(text: string, capacity: number = this._capacity): void {
    this._capacity = Math.max(0, Math.floor(capacity));
    this.entries = [{ text, caret: null }];
    this._level = 0;
  }
}
