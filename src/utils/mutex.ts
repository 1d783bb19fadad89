/**
 * Promise-chained locks. Each holder runs after the previous one settles,
 * and the lock is released on every exit path.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One mutex per key, created on demand and dropped once idle, so unrelated
 * keys never wait on each other and idle keys hold no memory.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders++;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) {
        this.locks.delete(key);
      }
    }
  }
}
