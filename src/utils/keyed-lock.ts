/**
 * Keyed Lock
 *
 * Per-key mutual exclusion for async work. Callers either queue behind the
 * current holder (runExclusive) or skip when the key is busy (tryRunExclusive).
 * Entries are removed once the last waiter finishes, so the map only holds
 * keys with work in flight.
 */

interface LockEntry {
  tail: Promise<void>;
  pending: number;
}

export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    entry.pending++;
    this.entries.set(key, entry);

    const previous = entry.tail;
    let release: () => void = () => undefined;
    entry.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;

    try {
      return await fn();
    } finally {
      entry.pending--;
      if (entry.pending === 0) {
        this.entries.delete(key);
      }
      release();
    }
  }

  /**
   * Run `fn` only if nobody holds `key`; resolves to `{ acquired: false }` otherwise.
   */
  async tryRunExclusive<T>(
    key: string,
    fn: () => Promise<T>
  ): Promise<{ acquired: true; value: T } | { acquired: false }> {
    if (this.isLocked(key)) {
      return { acquired: false };
    }

    const value = await this.runExclusive(key, fn);
    return { acquired: true, value };
  }

  isLocked(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Number of keys with work in flight or queued
   */
  size(): number {
    return this.entries.size;
  }
}
