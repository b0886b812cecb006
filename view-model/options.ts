/**
 * TextArea options: defaults, merging and validation.
 *
 * Every option may be given on construction or on update(); whatever is
 * not given keeps its previous value (or the default on construction).
 */

import { ConfigurationError } from '../core/errors';
import type { TextAlign } from '../core/layout/align';

/** A paragraph color: 0xRRGGBB, or a color with its own alpha. */
export type ParagraphColor = number | { color: number; alpha: number };

export interface TextAreaOptions {
  text: string;
  /** String measured to get the line box (top and height). */
  sample: string;
  align: TextAlign;
  /** Placement of content shorter than the area: 0 top, 1 bottom. */
  valign: number;
  /** Clip width; also the wrap width unless oneLine. null = unbounded. */
  width: number | null;
  /** Clip height. null = unbounded. */
  height: number | null;
  letterSpacing: number;
  /** Added to the sample's height to get the line height. */
  lineSpacing: number;
  /** Text color for every paragraph without an entry in colors. */
  color: number | null;
  /** Per-paragraph colors, indexed by hard line. */
  colors: readonly ParagraphColor[] | null;
  wholeWords: boolean;
  /** Show the text on one row: newlines render as spaces, no wrapping. */
  oneLine: boolean;
  /** Maximum text length in code points. null = unlimited. */
  maxChars: number | null;
  /** Maximum row length in code points. null = width only. */
  wrapColumn: number | null;
  /** Undo steps kept; 0 disables history. */
  undoLevels: number;
  caretWidth: number;
  caretColor: number;
  caretAlpha: number;
  selectionColor: number;
  selectionAlpha: number;
  sliderWidth: number;
  sliderColor: number;
  sliderAlpha: number;
  /** Accept focus, caret placement and keyboard editing. */
  edit: boolean;
  /** Accept drag scrolling. */
  scroll: boolean;
}

export const DEFAULT_OPTIONS: TextAreaOptions = {
  text: '',
  sample: 'qP|',
  align: 'left',
  valign: 0,
  width: null,
  height: null,
  letterSpacing: 0,
  lineSpacing: 0,
  color: null,
  colors: null,
  wholeWords: false,
  oneLine: false,
  maxChars: null,
  wrapColumn: null,
  undoLevels: 10,
  caretWidth: 2,
  caretColor: 0x000000,
  caretAlpha: 1,
  selectionColor: 0x888888,
  selectionAlpha: 0.25,
  sliderWidth: 2,
  sliderColor: 0x888888,
  sliderAlpha: 0.5,
  edit: false,
  scroll: false,
};

/** Merge overrides over a base. */
export function mergeOptions(
  base: TextAreaOptions,
  overrides: Partial<TextAreaOptions> = {},
): TextAreaOptions {
  return { ...base, ...overrides };
}

/** Throws ConfigurationError for the first invalid option. */
export function validateOptions(options: TextAreaOptions): void {
  if ((options.edit || options.scroll) && (options.width === null || options.height === null)) {
    throw new ConfigurationError('set width and height to edit or scroll text', 'width');
  }
  requirePositive(options.width, 'width');
  requirePositive(options.height, 'height');
  requirePositive(options.maxChars, 'maxChars');
  requirePositive(options.wrapColumn, 'wrapColumn');
  if (!Number.isInteger(options.undoLevels) || options.undoLevels < 0) {
    throw new ConfigurationError(`undoLevels must be a non-negative integer, got ${options.undoLevels}`, 'undoLevels');
  }
  requireFraction(options.valign, 'valign');
  if (typeof options.align === 'number') requireFraction(options.align, 'align');
  requireFraction(options.caretAlpha, 'caretAlpha');
  requireFraction(options.selectionAlpha, 'selectionAlpha');
  requireFraction(options.sliderAlpha, 'sliderAlpha');
  if (options.caretWidth < 0) throw new ConfigurationError('caretWidth must not be negative', 'caretWidth');
  if (options.sliderWidth < 0) throw new ConfigurationError('sliderWidth must not be negative', 'sliderWidth');
}

function requirePositive(value: number | null, option: keyof TextAreaOptions): void {
  if (value !== null && !(value > 0)) {
    throw new ConfigurationError(`${option} must be positive, got ${value}`, option);
  }
}

function requireFraction(value: number, option: keyof TextAreaOptions): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigurationError(`${option} must be within [0, 1], got ${value}`, option);
  }
}
