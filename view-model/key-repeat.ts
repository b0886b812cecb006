/**
 * Held-key auto repeat, counted in frames.
 *
 * With d = floor(delayMs * fps / 1000) and s = floor(spanMs * fps / 1000),
 * a key pressed at frame 0 re-fires on frames d, d + s, d + 2s, ... until
 * it is released.
 */

export interface KeyRepeatConfig {
  delayMs: number;
  spanMs: number;
  framesPerSecond: number;
}

const DEFAULT_CONFIG: KeyRepeatConfig = {
  delayMs: 500,
  spanMs: 50,
  framesPerSecond: 60,
};

export class KeyRepeat<T> {
  private _held: T | null = null;
  private counter: number = 0;
  private readonly delayFrames: number;
  private readonly spanFrames: number;

  constructor(config?: Partial<KeyRepeatConfig>) {
    const { delayMs, spanMs, framesPerSecond } = { ...DEFAULT_CONFIG, ...config };
    this.delayFrames = Math.floor((delayMs * framesPerSecond) / 1000);
    this.spanFrames = Math.max(1, Math.floor((spanMs * framesPerSecond) / 1000));
  }

  get held(): T | null {
    return this._held;
  }

  press(event: T): void {
    this._held = event;
    this.counter = 0;
  }

  release(): void {
    this._held = null;
    this.counter = 0;
  }

  /** Advance one frame. Returns the held event when it fires this frame. */
  tick(): T | null {
    if (this._held === null) {
      this.counter = 0;
      return null;
    }
    const c = this.counter + 1;
    this.counter = c;
    const fires = c >= this.delayFrames && (c - this.delayFrames) % this.spanFrames === 0;
    return fires ? this._held : null;
  }
}
