/**
 * Keyed Lock - Per-Key Mutual Exclusion
 *
 * Serializes async work that shares a key (a user id) while letting work for
 * different keys run freely. Each key has its own FIFO queue of waiters; a
 * key with nobody holding or waiting for it has no entry at all, so the lock
 * does not grow with the number of users ever seen.
 *
 * @example
 * ```typescript
 * const locks = new KeyedLock();
 *
 * // These two run one after the other
 * locks.runExclusive('user_1', () => ledger.append(a));
 * locks.runExclusive('user_1', () => ledger.append(b));
 *
 * // This one does not wait for user_1
 * locks.runExclusive('user_2', () => ledger.append(c));
 * ```
 */
export class KeyedLock {
  /** Keys currently held */
  private held: Set<string> = new Set();

  /** Waiters per key, resolved in arrival order */
  private waiters: Map<string, Array<() => void>> = new Map();

  /**
   * Runs `fn` while holding the lock for `key`.
   * The lock is released when `fn` settles, whether it resolves or throws.
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  /** Whether some operation currently holds `key`. */
  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /** Number of operations waiting for `key`. */
  pendingCount(key: string): number {
    return this.waiters.get(key)?.length ?? 0;
  }

  private acquire(key: string): Promise<void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const queue = this.waiters.get(key);
      if (queue) {
        queue.push(resolve);
      } else {
        this.waiters.set(key, [resolve]);
      }
    });
  }

  private release(key: string): void {
    const queue = this.waiters.get(key);
    const next = queue?.shift();

    if (queue && queue.length === 0) {
      this.waiters.delete(key);
    }

    if (next) {
      // Ownership passes straight to the next waiter; the key stays held
      next();
    } else {
      this.held.delete(key);
    }
  }
}
