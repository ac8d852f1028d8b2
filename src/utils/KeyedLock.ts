/**
 * Keyed Lock
 *
 * Serializes async critical sections per key. Sections for different keys
 * run concurrently. An exclusive section waits for every keyed section that
 * started before it and holds back every keyed section that starts after it.
 *
 * Not reentrant: a keyed section must not be requested from inside an
 * exclusive section, or from inside a section for the same key.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly inFlight = new Set<Promise<void>>();
  private exclusiveTail: Promise<void> = Promise.resolve();

  async withKey<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const gate = this.exclusiveTail;
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.inFlight.add(tail);

    try {
      await previous;
      await gate;
      return await fn();
    } finally {
      release();
      this.inFlight.delete(tail);
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  async withExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const pending = [...this.inFlight];
    const previous = this.exclusiveTail;

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.exclusiveTail = previous.then(() => current);

    try {
      await previous;
      await Promise.all(pending);
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Keys with a section running or queued
   */
  get size(): number {
    return this.tails.size;
  }
}
