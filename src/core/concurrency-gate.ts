/**
 * Concurrency Gate
 *
 * Counting semaphore bounding how many fetch calls run at once. A fetch
 * holds one slot for its whole retry sequence, however many pages it opens.
 * Waiters have no timeout and no fairness guarantee.
 */

export interface GateStats {
  capacity: number;
  active: number;
  waiting: number;
}

export class ConcurrencyGate {
  private active = 0;
  private waitingQueue: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Gate capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Take a slot without waiting. Returns false when the gate is full.
   */
  tryAcquire(): boolean {
    if (this.active < this.capacity) {
      this.active++;
      return true;
    }
    return false;
  }

  /**
   * Wait for a slot
   */
  async acquire(): Promise<void> {
    if (this.tryAcquire()) {
      return;
    }

    return new Promise<void>((resolve) => {
      this.waitingQueue.push(resolve);
    });
  }

  /**
   * Give a slot back, handing it straight to the next waiter if any
   */
  release(): void {
    if (this.active <= 0) {
      throw new Error('ConcurrencyGate.release() called with no slot held');
    }

    const next = this.waitingQueue.shift();
    if (next) {
      // Slot passes to the waiter; active count is unchanged
      next();
      return;
    }
    this.active--;
  }

  /**
   * Run fn while holding a slot; the slot is released on every exit path
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  stats(): GateStats {
    return {
      capacity: this.capacity,
      active: this.active,
      waiting: this.waitingQueue.length,
    };
  }
}
