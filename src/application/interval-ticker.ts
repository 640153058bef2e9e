/**
 * Periodic tick source for the batch worker.
 *
 * A tick that fires while nobody is listening stays pending until
 * `takeTick()` consumes it. Several missed ticks collapse into one.
 */
export class IntervalTicker {
  private pending = false;
  private listener: (() => void) | null = null;
  private timer: ReturnType<typeof setInterval> | null;

  constructor(periodMs: number) {
    this.timer = setInterval(() => {
      this.pending = true;
      const listener = this.listener;
      if (listener !== null) {
        this.listener = null;
        listener();
      }
    }, periodMs);
  }

  /** Consumes the pending tick, if any. */
  takeTick(): boolean {
    const fired = this.pending;
    this.pending = false;
    return fired;
  }

  /** Calls `listener` once on the next tick. Returns an unregister function. */
  onceTick(listener: () => void): () => void {
    this.listener = listener;
    return () => {
      if (this.listener === listener) {
        this.listener = null;
      }
    };
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.listener = null;
  }
}
