/**
 * View-model barrel export: the text area widget and its input session.
 */

export { TextArea } from './text-area';
export {
  type TextAreaOptions, type ParagraphColor,
  DEFAULT_OPTIONS, mergeOptions, validateOptions,
} from './options';
export { type RenderedLine, computeRenderedLines } from './line-layout';
export { CaretBlink, type CaretBlinkConfig } from './cursor-state';
export { KeyRepeat, type KeyRepeatConfig } from './key-repeat';
export {
  EditorSession, DEFAULT_SESSION_OPTIONS,
  type BlurReason, type SessionOptions, type PointerInput, type TickResult, type EditingFinishedListener,
} from './editor-session';
