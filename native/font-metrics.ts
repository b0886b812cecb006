/**
 * Font metrics contract: the only thing the engine asks of a font.
 *
 * Hosts implement it over their text renderer (canvas measureText, a
 * native text engine, a bitmap font table). Both queries must be pure
 * functions of the font and the string.
 */

/** Ink bounds of a string, relative to its pen origin on the baseline. */
export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FontMetrics {
  /** Ink bounding box of the string. Its width drives line breaking. */
  measureBounds(text: string): Bounds;

  /** Horizontal pen advance of the string, used to size inter-word gaps. */
  advanceX(text: string): number;
}

export interface FixedAdvanceOptions {
  /** Advance of every glyph without an override. */
  advance: number;
  /** Distance from baseline to the top of the tallest glyph. */
  ascent: number;
  /** Distance from baseline to the bottom of the lowest glyph. */
  descent: number;
  /** Per-glyph advance overrides. */
  overrides: Record<string, number>;
}

const DEFAULT_FIXED_ADVANCE: FixedAdvanceOptions = {
  advance: 8,
  ascent: 12,
  descent: 4,
  overrides: {},
};

/**
 * Metrics where every glyph has a fixed advance and the ink box equals the
 * advance box. Used by tests and headless hosts; the numbers are exact, so
 * layouts are reproducible to the pixel.
 */
export class FixedAdvanceMetrics implements FontMetrics {
  private readonly _options: FixedAdvanceOptions;
  private _measureCalls: number = 0;

  constructor(options?: Partial<FixedAdvanceOptions>) {
    this._options = { ...DEFAULT_FIXED_ADVANCE, ...options };
  }

  /** Number of measureBounds calls made so far. */
  get measureCalls(): number {
    return this._measureCalls;
  }

  measureBounds(text: string): Bounds {
    this._measureCalls++;
    return {
      x: 0,
      y: -this._options.ascent,
      width: this.advanceX(text),
      height: this._options.ascent + this._options.descent,
    };
  }

  advanceX(text: string): number {
    let width = 0;
    for (const glyph of text) {
      width += this._options.overrides[glyph] ?? this._options.advance;
    }
    return width;
  }
}
