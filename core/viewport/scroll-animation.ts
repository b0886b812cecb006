/**
 * Frame-counted linear scroll animation. Advanced by the host loop via
 * tick(); owns no timers.
 */

export interface ScrollPoint {
  x: number;
  y: number;
}

export class ScrollAnimation {
  private from: ScrollPoint;
  private to: ScrollPoint;
  private totalFrames: number;
  private elapsed: number = 0;

  constructor(from: ScrollPoint, to: ScrollPoint, frames: number) {
    this.from = { ...from };
    this.to = { ...to };
    this.totalFrames = Math.max(1, Math.floor(frames));
  }

  get done(): boolean {
    return this.elapsed >= this.totalFrames;
  }

  get target(): ScrollPoint {
    return { ...this.to };
  }

  /** Advance by frames and return the interpolated point. */
  tick(frames: number = 1): ScrollPoint {
    this.elapsed = Math.min(this.totalFrames, this.elapsed + Math.max(0, frames));
    const t = this.elapsed / this.totalFrames;
    return {
      x: this.from.x + (this.to.x - this.from.x) * t,
      y: this.from.y + (this.to.y - this.from.y) * t,
    };
  }
}
