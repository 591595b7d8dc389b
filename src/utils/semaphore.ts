type Waiter = {
  resolve: (acquired: boolean) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Counting semaphore with first-come-first-served waiters.
 * Used as the job-slot limiter for parallel installs.
 */
export class Semaphore {
  readonly capacity: number;
  private active = 0;
  private peak = 0;
  private waiters: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be an integer >= 1 (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  /**
   * Take a slot, waiting for one to free up if needed.
   * Resolves `false` without taking a slot if `signal` aborts first.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);
    if (this.active < this.capacity) {
      this.take();
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(false);
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Take a slot only if one is free right now. */
  tryAcquire(): boolean {
    if (this.active >= this.capacity) return false;
    this.take();
    return true;
  }

  /** Hand the slot to the oldest waiter, or return it to the pool. */
  release(): void {
    if (this.active === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    const next = this.waiters.shift();
    if (next) {
      if (next.signal && next.onAbort) next.signal.removeEventListener("abort", next.onAbort);
      next.resolve(true);
      return;
    }
    this.active--;
  }

  getStats(): { active: number; peak: number; waiting: number; available: number } {
    return {
      active: this.active,
      peak: this.peak,
      waiting: this.waiters.length,
      available: this.capacity - this.active,
    };
  }

  private take(): void {
    this.active++;
    if (this.active > this.peak) this.peak = this.active;
  }
}
