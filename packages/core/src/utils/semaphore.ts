/**
 * Counting semaphore with FIFO hand-off.
 *
 * `release()` passes the permit straight to the oldest waiter, so a permit
 * freed while others queue never becomes observable as available.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  get size(): number {
    return this.permits;
  }

  get availablePermits(): number {
    return this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.available < this.permits) {
      this.available++;
    }
  }

  /**
   * Runs `fn` while holding a permit.
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
