/**
 * EditorSession: the focused text area and everything that follows input.
 *
 * At most one TextArea holds focus. The session owns the modifier state,
 * the pointer drag, caret blink, key repeat and the shared clipboard, and
 * routes host events to the focused area. Switching areas always blurs the
 * old one before the new one takes focus.
 *
 * Nothing here owns a timer: the host calls tick() once per frame.
 */

import { ConfigurationError } from '../core/errors';
import { type Logger, consoleLogger } from '../core/log';
import { Clipboard, type HostClipboard } from '../core/commands/clipboard';
import {
  type EditCommand,
  type KeyDownEvent,
  type KeyUpEvent,
  type ModifierState,
  createModifierState,
  isModifierKey,
  resolveKeyDown,
} from '../core/commands/keys';
import { CaretBlink } from './cursor-state';
import { KeyRepeat } from './key-repeat';
import type { TextArea } from './text-area';

export type BlurReason = 'escape' | 'go' | 'switch' | 'manual';

export interface SessionOptions {
  caretShowFrames: number;
  caretHideFrames: number;
  repeatDelayMs: number;
  repeatSpanMs: number;
  framesPerSecond: number;
}

export const DEFAULT_SESSION_OPTIONS: SessionOptions = {
  caretShowFrames: 30,
  caretHideFrames: 30,
  repeatDelayMs: 500,
  repeatSpanMs: 50,
  framesPerSecond: 60,
};

/** Pointer position in the area's viewport coordinates. */
export interface PointerInput {
  x: number;
  y: number;
  touch: boolean;
}

export interface TickResult {
  caretVisible: boolean;
  scrollX: number;
  scrollY: number;
}

export type EditingFinishedListener = (area: TextArea, wasEscaped: boolean) => void;

type PointerMode =
  | { kind: 'idle' }
  | { kind: 'select' }
  | { kind: 'scroll'; lastX: number; lastY: number };

export class EditorSession {
  readonly clipboard: Clipboard;

  private _focused: TextArea | null = null;
  private focusText: string = '';
  private _modifiers: ModifierState = createModifierState();
  private pointer: PointerMode = { kind: 'idle' };
  private blink: CaretBlink;
  private repeat: KeyRepeat<KeyDownEvent>;
  private logger: Logger;
  private _listeners: EditingFinishedListener[] = [];

  constructor(
    options?: Partial<SessionOptions>,
    hostClipboard: HostClipboard | null = null,
    logger: Logger = consoleLogger,
  ) {
    const o = { ...DEFAULT_SESSION_OPTIONS, ...options };
    this.blink = new CaretBlink({ showFrames: o.caretShowFrames, hideFrames: o.caretHideFrames });
    this.repeat = new KeyRepeat({
      delayMs: o.repeatDelayMs,
      spanMs: o.repeatSpanMs,
      framesPerSecond: o.framesPerSecond,
    });
    this.logger = logger;
    this.clipboard = new Clipboard(hostClipboard, logger);
  }

  get focused(): TextArea | null {
    return this._focused;
  }

  get modifiers(): Readonly<ModifierState> {
    return this._modifiers;
  }

  /**
   * Subscribe to editing-finished: fired once when a focused area whose
   * text changed loses focus. wasEscaped is true for Escape and for focus
   * moving to another area.
   */
  onEditingFinished(listener: EditingFinishedListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx !== -1) this._listeners.splice(idx, 1);
    };
  }

  // === Focus ===

  focus(area: TextArea): void {
    const { width, height } = area.options;
    if (width === null || height === null) {
      throw new ConfigurationError('set width and height to focus a text area', 'width');
    }
    if (this._focused === area) return;
    if (this._focused) this.blur('switch');

    this._focused = area;
    this.focusText = area.text;
    this.blink.reset();
    this.logger.debug('focus acquired', { caret: area.caret });
  }

  blur(reason: BlurReason = 'manual'): void {
    const area = this._focused;
    if (!area) return;

    this._focused = null;
    this.repeat.release();
    this._modifiers = createModifierState();
    this.pointer = { kind: 'idle' };
    area.setCaret(area.caret);
    this.logger.debug('focus released', { reason });

    if (area.text !== this.focusText) {
      const wasEscaped = reason === 'escape' || reason === 'switch';
      this.logger.debug('editing finished', { reason, wasEscaped });
      for (const listener of [...this._listeners]) listener(area, wasEscaped);
    }
  }

  // === Keyboard ===

  /** @returns Whether the key changed anything. */
  keyDown(event: KeyDownEvent): boolean {
    const area = this._focused;
    if (!area || !area.options.edit) return false;

    this.blink.reset();
    const command = resolveKeyDown(event, this._modifiers, area.options.oneLine);
    if (command.kind === 'modifier') {
      this._modifiers[command.key] = true;
      this.repeat.release();
      return true;
    }

    this.repeat.press(event);
    return this.execute(area, command);
  }

  keyUp(event: KeyUpEvent): void {
    if (isModifierKey(event.special)) this._modifiers[event.special] = false;
    this.repeat.release();
  }

  // === Pointer ===

  /**
   * Press on an area, focusing it. A mouse press on an editable area
   * places the caret and starts a drag selection; a touch, or any press on
   * a scroll-only area, starts a drag scroll.
   *
   * @returns Whether the press was taken.
   */
  pointerDown(area: TextArea, event: PointerInput): boolean {
    const { edit, scroll } = area.options;
    if (!edit && !scroll) return false;
    if (!area.containsPoint(event.x, event.y)) return false;

    this.focus(area);
    this.blink.reset();

    if (!edit || event.touch) {
      this.pointer = { kind: 'scroll', lastX: event.x, lastY: event.y };
      return true;
    }
    area.setCaret(area.caretFromPoint(event.x, event.y) ?? area.caret);
    this.pointer = { kind: 'select' };
    return true;
  }

  pointerMove(event: PointerInput): boolean {
    const area = this._focused;
    if (!area) return false;

    switch (this.pointer.kind) {
      case 'idle':
        return false;
      case 'scroll': {
        const dx = event.x - this.pointer.lastX;
        const dy = event.y - this.pointer.lastY;
        this.pointer = { kind: 'scroll', lastX: event.x, lastY: event.y };
        area.scrollBy(-dx, -dy);
        return true;
      }
      case 'select':
        area.setCaret(area.caretFromPoint(event.x, event.y) ?? area.caret, true);
        this.blink.reset();
        return true;
    }
  }

  /**
   * Release. Ends a drag selection at the release point; a touch released
   * on an editable area places the caret there.
   */
  pointerUp(event: PointerInput): boolean {
    const area = this._focused;
    const mode = this.pointer;
    this.pointer = { kind: 'idle' };
    if (!area) return false;

    switch (mode.kind) {
      case 'idle':
        return false;
      case 'select':
        area.setCaret(area.caretFromPoint(event.x, event.y) ?? area.caret, true);
        this.blink.reset();
        return true;
      case 'scroll': {
        if (!event.touch || !area.options.edit) return true;
        const x = Math.max(0, Math.min(event.x, area.viewport.viewportWidth));
        const y = Math.max(0, Math.min(event.y, area.viewport.viewportHeight));
        area.setCaret(area.caretFromPoint(x, y) ?? area.caret);
        this.blink.reset();
        return true;
      }
    }
  }

  // === Frame tick ===

  /**
   * Advance key repeat, caret blink and scroll animation by whole frames.
   * Returns null when nothing is focused.
   */
  tick(frames: number = 1): TickResult | null {
    for (let f = 0; f < frames; f++) {
      const area = this._focused;
      if (!area) break;
      const repeated = this.repeat.tick();
      if (repeated !== null) {
        this.blink.reset();
        const command = resolveKeyDown(repeated, this._modifiers, area.options.oneLine);
        this.execute(area, command);
      }
      this.blink.tick();
      area.viewport.tick();
    }

    const area = this._focused;
    if (!area) return null;
    return {
      caretVisible: area.options.edit && this.blink.visible,
      scrollX: area.viewport.offsetX,
      scrollY: area.viewport.offsetY,
    };
  }

  private execute(area: TextArea, command: EditCommand): boolean {
    switch (command.kind) {
      case 'insert':
        return area.insertText(command.text);
      case 'paste':
        return area.paste(this.clipboard);
      case 'move':
        area.moveCaret(command.direction, command.extend);
        return true;
      case 'deleteBackward':
        return area.deleteBackward();
      case 'deleteForward':
        return area.deleteForward();
      case 'selectAll':
        area.selectAll();
        return true;
      case 'copy':
        return area.copy(this.clipboard);
      case 'cut':
        return area.cut(this.clipboard);
      case 'duplicate':
        return area.duplicate();
      case 'undo':
        return area.undo();
      case 'redo':
        return area.redo();
      case 'finish':
        this.blur(command.reason);
        return true;
      case 'modifier':
        this._modifiers[command.key] = true;
        return true;
      case 'none':
        return false;
    }
  }
}
