/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Errors and logging
export { ConfigurationError } from './errors';
export { type Logger, consoleLogger, silentLogger } from './log';

// Text
export { toCodePoints, codePointLength, sliceCodePoints, insertAt, removeRange } from './text/codepoints';

// Layout
export {
  type CharCell, type Section, type TextLayout,
  isSpace, endPosition, lastVisibleIndex, rowVisibleWidth, endsWithHardBreak,
} from './layout/types';
export { wrapLines, type WrapOptions } from './layout/line-breaker';
export { justifyLayout, type JustifyResult, type RowJustification } from './layout/justify';
export { alignLayout, alignFraction, rowOffset, type TextAlign } from './layout/align';

// Cursor
export { CursorModel, type CursorDirection, type CaretPoint } from './cursor/cursor-model';
export {
  type Selection, type SelectionRange, type Rect,
  normalizeSelection, isSelectionEmpty, selectionRects,
} from './cursor/selection';

// Commands
export { Clipboard, type HostClipboard } from './commands/clipboard';
export {
  type SpecialKey, type ModifierKey, type ModifierState, type KeyDownEvent, type KeyUpEvent,
  type EditCommand, type FinishReason,
  resolveKeyDown, createModifierState, isModifierKey,
} from './commands/keys';

// History
export { HistoryManager, type HistoryEntry } from './history/history-manager';

// Viewport
export { ViewportController, type Sliders } from './viewport/viewport-controller';
export { ScrollAnimation, type ScrollPoint } from './viewport/scroll-animation';
