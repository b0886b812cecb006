/**
 * Scroll state of a clipped text area: scroll ranges, the anchor (scroll
 * offset), vertical alignment of short content, reveal-the-caret and
 * slider geometry.
 */

import type { Rect } from '../cursor/selection';
import { ScrollAnimation, type ScrollPoint } from './scroll-animation';

/** Keeps a 1px rounding difference from producing a scroll range. */
const BOUNDARY_GUARD = 1;

/** Scroll ranges at or below this hide their slider. */
const MIN_SLIDER_RANGE = 1;

export interface Sliders {
  horizontal: Rect;
  vertical: Rect;
}

export class ViewportController {
  private _viewportWidth: number = 0;
  private _viewportHeight: number = 0;
  private _contentWidth: number = 0;
  private _contentHeight: number = 0;
  private _anchorX: number = 0;
  private _anchorY: number = 0;
  private _valign: number = 0;
  private _caretWidth: number = 0;
  private _lineHeight: number = 0;
  private animation: ScrollAnimation | null = null;

  get viewportWidth(): number { return this._viewportWidth; }
  get viewportHeight(): number { return this._viewportHeight; }
  get contentWidth(): number { return this._contentWidth; }
  get contentHeight(): number { return this._contentHeight; }
  get anchorX(): number { return this._anchorX; }
  get anchorY(): number { return this._anchorY; }
  get valign(): number { return this._valign; }

  get scrollWidth(): number {
    return Math.max(this._contentWidth - this._viewportWidth - BOUNDARY_GUARD, 0);
  }

  get scrollHeight(): number {
    return Math.max(this._contentHeight - this._viewportHeight - BOUNDARY_GUARD, 0);
  }

  /** Horizontal offset of the visible window into the layout. */
  get offsetX(): number {
    return this._anchorX;
  }

  /**
   * Vertical offset of the visible window. While the content fits, this is
   * the static valign placement rather than a scroll position.
   */
  get offsetY(): number {
    if (this.scrollHeight === 0) {
      return this._valign * (this._contentHeight - this._viewportHeight);
    }
    return this._anchorY;
  }

  get animating(): boolean {
    return this.animation !== null;
  }

  setViewport(width: number, height: number): void {
    this._viewportWidth = width;
    this._viewportHeight = height;
    this.clamp();
  }

  setContent(width: number, height: number): void {
    this._contentWidth = width;
    this._contentHeight = height;
    this.clamp();
  }

  /** 0 = top, 1 = bottom. */
  setValign(valign: number): void {
    this._valign = valign;
  }

  setCaretWidth(width: number): void {
    this._caretWidth = width;
  }

  setLineHeight(height: number): void {
    this._lineHeight = height;
  }

  /** Scroll to an absolute anchor. Cancels a running animation. */
  scrollTo(x: number, y: number): void {
    this.animation = null;
    this._anchorX = x;
    this._anchorY = y;
    this.clamp();
  }

  /** Scroll by a relative amount. */
  scrollBy(deltaX: number, deltaY: number): void {
    this.scrollTo(this._anchorX + deltaX, this._anchorY + deltaY);
  }

  /**
   * Shift the anchor by the least amount that brings the caret into view.
   * The right edge keeps room for the caret's width, the bottom edge for
   * a whole line.
   *
   * @returns Whether the anchor moved.
   */
  revealCaret(x: number, y: number): boolean {
    let ax = this._anchorX;
    let ay = this._anchorY;

    if (x < ax) {
      ax = x;
    } else if (x + this._caretWidth > ax + this._viewportWidth) {
      ax = x + this._caretWidth - this._viewportWidth;
    }

    if (y < ay) {
      ay = y;
    } else if (y + this._lineHeight > ay + this._viewportHeight) {
      ay = y + this._lineHeight - this._viewportHeight;
    }

    const beforeX = this._anchorX;
    const beforeY = this._anchorY;
    this.scrollTo(ax, ay);
    return beforeX !== this._anchorX || beforeY !== this._anchorY;
  }

  /** Animate to an anchor over a number of host frames. */
  animateTo(x: number, y: number, frames: number): void {
    if (frames <= 0) {
      this.scrollTo(x, y);
      return;
    }
    const to = this.clampPoint({ x, y });
    this.animation = new ScrollAnimation({ x: this._anchorX, y: this._anchorY }, to, frames);
  }

  /**
   * Advance a running animation.
   * @returns Whether an animation is still in flight afterwards.
   */
  tick(frames: number = 1): boolean {
    if (!this.animation) return false;
    const point = this.clampPoint(this.animation.tick(frames));
    this._anchorX = point.x;
    this._anchorY = point.y;
    if (this.animation.done) this.animation = null;
    return this.animation !== null;
  }

  /**
   * Scrollbar thumbs in layout coordinates. A thumb's length is
   * viewport² / content; a zero-size rect means the slider is hidden.
   */
  sliders(sliderWidth: number): Sliders {
    const vw = this._viewportWidth;
    const vh = this._viewportHeight;
    const left = this.offsetX;
    const top = this.offsetY;

    const horizontal: Rect = { x: left, y: top + vh - sliderWidth, width: 0, height: 0 };
    const rangeX = this.scrollWidth;
    if (rangeX > MIN_SLIDER_RANGE) {
      const length = (vw * vw) / this._contentWidth;
      horizontal.x = left + ((vw - length) * this._anchorX) / rangeX;
      horizontal.width = length;
      horizontal.height = sliderWidth;
    }

    const vertical: Rect = { x: left + vw - sliderWidth, y: top, width: 0, height: 0 };
    const rangeY = this.scrollHeight;
    if (rangeY > MIN_SLIDER_RANGE) {
      const length = (vh * vh) / this._contentHeight;
      vertical.y = top + ((vh - length) * this._anchorY) / rangeY;
      vertical.width = sliderWidth;
      vertical.height = length;
    }

    return { horizontal, vertical };
  }

  private clamp(): void {
    const point = this.clampPoint({ x: this._anchorX, y: this._anchorY });
    this._anchorX = point.x;
    this._anchorY = point.y;
  }

  private clampPoint(point: ScrollPoint): ScrollPoint {
    return {
      x: Math.max(0, Math.min(point.x, this.scrollWidth)),
      y: Math.max(0, Math.min(point.y, this.scrollHeight)),
    };
  }
}
