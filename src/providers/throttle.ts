export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
};

/**
 * Serializes provider calls and keeps at least `minIntervalMs` between the end
 * of one call and the start of the next. One instance is shared by every
 * component that talks to the same upstream.
 */
export class RequestThrottle {
  private lastFinishedAt: number | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  run<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(
      () => this.execute(fn),
      () => this.execute(fn),
    );
    this.queue = next.catch(() => undefined);
    return next;
  }

  /** Milliseconds the next call would have to wait right now. */
  pendingDelay(): number {
    if (this.lastFinishedAt === null) return 0;
    return Math.max(0, this.lastFinishedAt + this.minIntervalMs - this.clock.now());
  }

  private async execute<T>(fn: () => Promise<T>): Promise<T> {
    const wait = this.pendingDelay();
    if (wait > 0) await this.clock.sleep(wait);
    try {
      return await fn();
    } finally {
      this.lastFinishedAt = this.clock.now();
    }
  }
}
