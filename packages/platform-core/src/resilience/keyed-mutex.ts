/**
 * KeyedMutex
 *
 * Serializes async work per string key. Each key owns a promise chain: a caller
 * waits for the previous holder's tail, runs, then releases. Entries are created
 * on first use and dropped once no caller holds or waits on them.
 */

interface LockEntry {
  tail: Promise<void>;
  holders: number;
}

export class KeyedMutex {
  private readonly locks = new Map<string, LockEntry>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { tail: Promise.resolve(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders++;

    let release: () => void = () => {};
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = entry.tail;
    entry.tail = previous.then(() => released);

    try {
      await previous;
      return await task();
    } finally {
      release();
      entry.holders--;
      if (entry.holders === 0 && this.locks.get(key) === entry) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
