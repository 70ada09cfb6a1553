/**
 * In-process exclusive locks keyed by string.
 *
 * Critical sections sharing a key run one after another in arrival order;
 * different keys run concurrently. Used for ancestor-chain serialization of
 * transitions and for dependency graph mutations. Cross-process exclusion is
 * the file store's job (see store/lock.ts).
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Run `fn` while holding the lock for `key`. */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any holder or waiter exists for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/** Lock key for dependency graph mutations. */
export const GRAPH_LOCK_KEY = 'dependency-graph';

/** Lock key for the ancestor chain rooted at `rootId`. */
export function chainLockKey(rootId: string): string {
  return `chain:${rootId}`;
}
