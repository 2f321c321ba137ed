/**
 * NodeLock - Per-node FIFO mutex
 *
 * The poll loop and transport callbacks (connection state changes, publish
 * acknowledgements) both touch the breaker counters, the retry buffer and
 * the node role. Every such state transition runs inside runExclusive(),
 * one at a time, in arrival order.
 *
 * Not re-entrant: calling runExclusive() from inside a held section waits
 * for itself forever. Keep held sections short and never nest them.
 */

export class NodeLock {
  // Waiters in arrival order; the head holds the lock
  private queue: Array<() => void> = [];

  /** Resolves once the caller holds the lock */
  private acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
      if (this.queue.length === 1) {
        resolve();
      }
    });
  }

  private release(): void {
    this.queue.shift();
    const next = this.queue[0];
    if (next) {
      next();
    }
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.queue.length > 0;
  }

  /** Callers waiting behind the current holder */
  pending(): number {
    return Math.max(0, this.queue.length - 1);
  }
}
