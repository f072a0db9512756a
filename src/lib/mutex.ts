/**
 * FIFO async mutex.
 *
 * Callers queue in arrival order; release hands the lock straight to the
 * next waiter so nobody can barge in between.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /**
   * Run `fn` while holding the lock. The lock is released whether `fn`
   * returns, resolves, throws or rejects.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getPendingCount(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }
}
