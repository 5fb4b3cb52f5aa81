interface LockEntry {
  tail: Promise<void>;
  pending: number;
  lastReleased: number;
}

/**
 * Per-key mutual exclusion built on promise chains.
 * Tasks sharing a key run one at a time in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private locks: Map<string, LockEntry> = new Map();

  constructor(private now: () => number = Date.now) {}

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { tail: Promise.resolve(), pending: 0, lastReleased: this.now() };
      this.locks.set(key, entry);
    }

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = entry.tail;
    entry.tail = previous.then(() => held);
    entry.pending++;

    await previous;
    try {
      return await task();
    } finally {
      entry.pending--;
      entry.lastReleased = this.now();
      release();
    }
  }

  /**
   * Drop entries with nothing queued that have been idle longer than `idleMs`
   * @returns number of entries removed
   */
  sweep(idleMs: number): number {
    const cutoff = this.now() - idleMs;
    let removed = 0;

    for (const [key, entry] of this.locks) {
      if (entry.pending === 0 && entry.lastReleased <= cutoff) {
        this.locks.delete(key);
        removed++;
      }
    }

    return removed;
  }

  size(): number {
    return this.locks.size;
  }

  clear(): void {
    this.locks.clear();
  }
}
