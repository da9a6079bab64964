/**
 * Mutual exclusion for async sections. Release hands the lock straight to the
 * next waiter, so a newcomer can never slip in between.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 * await mutex.runExclusive(async () => {
 *   await writeCommand();
 * });
 * ```
 */
export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get waitingCount(): number {
    return this.waitQueue.length;
  }

  /**
   * @returns A release function that must be called exactly once; extra calls are ignored
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    } else {
      this.locked = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
