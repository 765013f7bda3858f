// src/concurrency/keyedMutex.ts
// In-process per-key locks. Operations on the same key run one at a time;
// different keys never block each other.

export type TryExclusiveResult<T> =
  | { status: 'accepted'; result: T }
  | { status: 'rejected'; reason: 'busy' };

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /** Whether an operation currently holds (or waits for) `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Queue `fn` behind every earlier operation on `key`.
   * The lock is released when `fn` settles, including on thrown errors.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /**
   * Run `fn` only if nothing holds or waits on `key`; otherwise return
   * immediately with status "rejected".
   */
  async tryRunExclusive<T>(key: string, fn: () => Promise<T>): Promise<TryExclusiveResult<T>> {
    if (this.isLocked(key)) {
      return { status: 'rejected', reason: 'busy' };
    }
    const result = await this.runExclusive(key, fn);
    return { status: 'accepted', result };
  }
}
