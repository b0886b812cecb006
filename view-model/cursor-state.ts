/**
 * Caret blink state, advanced by the host's frame tick.
 */

export interface CaretBlinkConfig {
  /** Frames the caret stays visible per cycle. */
  showFrames: number;
  /** Frames the caret stays hidden per cycle. */
  hideFrames: number;
}

const DEFAULT_CONFIG: CaretBlinkConfig = {
  showFrames: 30,
  hideFrames: 30,
};

export class CaretBlink {
  private config: CaretBlinkConfig;
  private counter: number = 0;

  constructor(config?: Partial<CaretBlinkConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get visible(): boolean {
    const cycle = this.config.showFrames + this.config.hideFrames;
    if (cycle <= 0) return true;
    return this.counter % cycle < this.config.showFrames;
  }

  /** Restart the cycle visible (call on any caret movement or edit). */
  reset(): void {
    this.counter = 0;
  }

  tick(frames: number = 1): boolean {
    const cycle = this.config.showFrames + this.config.hideFrames;
    if (cycle > 0) this.counter = (this.counter + Math.max(0, frames)) % cycle;
    return this.visible;
  }
}
