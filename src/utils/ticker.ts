/**
 * Fixed-interval ticker. Drives progress redraws from outside the
 * coordinator, which only ever hands out snapshots.
 */
export class Ticker {
  private timer: ReturnType<typeof setInterval> | null;
  private onTick: () => void;
  private intervalMs: number;

  constructor(onTick: () => void, intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Ticker interval must be positive, got ${intervalMs}`);
    }
    this.onTick = onTick;
    this.intervalMs = intervalMs;
    this.timer = null;
  }

  /** Fire once immediately, then every interval. */
  start(): void {
    if (this.timer) {
      return;
    }
    this.onTick();
    this.timer = setInterval(this.onTick, this.intervalMs);
    // Never keep the process alive just to redraw
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
