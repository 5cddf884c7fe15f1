/**
 * Async mutual-exclusion lock with FIFO hand-off
 */

export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (!this.locked) {
      throw new Error('release() on an unlocked mutex');
    }
    const next = this.waiters.shift();
    if (next) {
      // Direct hand-off keeps the lock held by the next waiter.
      next();
      return;
    }
    this.locked = false;
  }

  isLocked(): boolean {
    return this.locked;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
