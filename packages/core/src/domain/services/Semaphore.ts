/**
 * Counting semaphore bounding how many async tasks run at once.
 *
 * Waiters are released in FIFO order. `release()` hands the permit straight to
 * the next waiter, so `inFlight` never exceeds `permits`.
 */
export class Semaphore {
  private readonly permits: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${String(permits)}`);
    }
    this.permits = permits;
  }

  /** Number of permits currently held. */
  get inFlight(): number {
    return this.active;
  }

  /** Number of callers waiting for a permit. */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.active < this.permits) {
      this.active++;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes to the waiter; `active` is unchanged.
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.active--;
  }

  /** Run `task` while holding a permit. The permit is released even if `task` rejects. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
