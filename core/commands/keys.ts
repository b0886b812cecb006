/**
 * Key identity and key-to-command resolution.
 *
 * Hosts translate their native key codes into a closed SpecialKey set;
 * everything else arrives as text. resolveKeyDown maps an event plus the
 * held modifiers to one EditCommand, matched exhaustively by the session.
 */

import type { CursorDirection } from '../cursor/cursor-model';

export type ModifierKey = 'Shift' | 'Ctrl' | 'Alt' | 'Meta';

export type SpecialKey =
  | ModifierKey
  | 'Escape' | 'Go' | 'Enter' | 'NumEnter' | 'Tab'
  | 'Backspace' | 'Delete'
  | 'Left' | 'Right' | 'Up' | 'Down'
  | 'Home' | 'End' | 'PageUp' | 'PageDown'
  | 'SelectAll' | 'Copy' | 'Cut' | 'Paste' | 'Duplicate' | 'Undo' | 'Redo'
  | 'Insert' | 'CapsLock' | 'NumLock' | 'ScrollLock' | 'PauseBreak';

export interface KeyDownEvent {
  /** Host key code; for character keys, the code point typed. */
  code: number;
  /** Named key, or null for a character key. */
  special: SpecialKey | null;
  /** Text produced by the key, when the host knows it. */
  text?: string;
  /** Shift state reported with the event. */
  shift: boolean;
}

export interface KeyUpEvent {
  code: number;
  special: SpecialKey | null;
}

export type ModifierState = Record<ModifierKey, boolean>;

export type FinishReason = 'escape' | 'go';

export type EditCommand =
  | { kind: 'insert'; text: string }
  | { kind: 'paste' }
  | { kind: 'move'; direction: CursorDirection; extend: boolean }
  | { kind: 'deleteBackward' }
  | { kind: 'deleteForward' }
  | { kind: 'selectAll' }
  | { kind: 'copy' }
  | { kind: 'cut' }
  | { kind: 'duplicate' }
  | { kind: 'undo' }
  | { kind: 'redo' }
  | { kind: 'finish'; reason: FinishReason }
  | { kind: 'modifier'; key: ModifierKey }
  | { kind: 'none' };

/** Ctrl + letter shortcuts. */
const HOTKEYS: ReadonlyMap<string, SpecialKey> = new Map<string, SpecialKey>([
  ['a', 'SelectAll'],
  ['c', 'Copy'],
  ['x', 'Cut'],
  ['v', 'Paste'],
  ['d', 'Duplicate'],
  ['z', 'Undo'],
  ['y', 'Redo'],
]);

const TAB_TEXT = '  ';

const MAX_CODE_POINT = 0x10ffff;

export function createModifierState(): ModifierState {
  return { Shift: false, Ctrl: false, Alt: false, Meta: false };
}

export function isModifierKey(key: SpecialKey | null): key is ModifierKey {
  return key === 'Shift' || key === 'Ctrl' || key === 'Alt' || key === 'Meta';
}

export function resolveKeyDown(
  event: KeyDownEvent,
  modifiers: Readonly<ModifierState>,
  oneLine: boolean,
): EditCommand {
  const shift = event.shift || modifiers.Shift;
  let special = event.special;

  if (modifiers.Ctrl && special === null) {
    const letter = keyText(event, false);
    const hotkey = letter !== null ? HOTKEYS.get(letter.toLowerCase()) : undefined;
    if (hotkey === undefined) return { kind: 'none' };
    special = hotkey;
  }

  if (special !== null) return resolveSpecial(special, shift, oneLine);

  const text = keyText(event, shift);
  return text === null ? { kind: 'none' } : { kind: 'insert', text };
}

function resolveSpecial(key: SpecialKey, shift: boolean, oneLine: boolean): EditCommand {
  switch (key) {
    case 'Shift':
    case 'Ctrl':
    case 'Alt':
    case 'Meta':
      return { kind: 'modifier', key };
    case 'Escape':
      return { kind: 'finish', reason: 'escape' };
    case 'Go':
      return { kind: 'finish', reason: 'go' };
    case 'Enter':
    case 'NumEnter':
      return shift || oneLine ? { kind: 'finish', reason: 'go' } : { kind: 'insert', text: '\n' };
    case 'Tab':
      return { kind: 'insert', text: TAB_TEXT };
    case 'Backspace':
      return { kind: 'deleteBackward' };
    case 'Delete':
      return { kind: 'deleteForward' };
    case 'Left':
      return { kind: 'move', direction: 'left', extend: shift };
    case 'Right':
      return { kind: 'move', direction: 'right', extend: shift };
    case 'Up':
      return { kind: 'move', direction: 'up', extend: shift };
    case 'Down':
      return { kind: 'move', direction: 'down', extend: shift };
    case 'Home':
      return { kind: 'move', direction: 'home', extend: shift };
    case 'End':
      return { kind: 'move', direction: 'end', extend: shift };
    case 'PageUp':
      return { kind: 'move', direction: 'pageUp', extend: shift };
    case 'PageDown':
      return { kind: 'move', direction: 'pageDown', extend: shift };
    case 'SelectAll':
      return { kind: 'selectAll' };
    case 'Copy':
      return { kind: 'copy' };
    case 'Cut':
      return { kind: 'cut' };
    case 'Paste':
      return { kind: 'paste' };
    case 'Duplicate':
      return { kind: 'duplicate' };
    case 'Undo':
      return { kind: 'undo' };
    case 'Redo':
      return { kind: 'redo' };
    case 'Insert':
    case 'CapsLock':
    case 'NumLock':
    case 'ScrollLock':
    case 'PauseBreak':
      return { kind: 'none' };
  }
}

/** Text a character key types; hosts without text get the code point, lowercased unless shifted. */
function keyText(event: KeyDownEvent, shift: boolean): string | null {
  if (event.text !== undefined && event.text !== '') return event.text;
  if (event.code <= 0 || event.code > MAX_CODE_POINT) return null;
  const glyph = String.fromCodePoint(event.code);
  return shift ? glyph : glyph.toLowerCase();
}
