/**
 * Counting semaphore. Waiters are served in arrival order.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private readonly waiting: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    // Hand the permit straight to the next waiter, if any
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get queueLength(): number {
    return this.waiting.length;
  }

  get max(): number {
    return this.maxPermits;
  }
}
