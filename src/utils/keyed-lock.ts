/**
 * Serializes async operations that share a key. Callers with different keys
 * run freely; callers with the same key run one after another in arrival
 * order.
 */
export class KeyedLock {
  private readonly operationLocks: Map<string, Promise<void>> = new Map();

  async acquire(key: string): Promise<() => void> {
    const previous = this.operationLocks.get(key) ?? Promise.resolve();

    let releaseLock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const tail = previous.then(() => current);
    this.operationLocks.set(key, tail);

    await previous;

    return () => {
      releaseLock();
      if (this.operationLocks.get(key) === tail) {
        this.operationLocks.delete(key);
      }
    };
  }

  async runExclusive<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.operationLocks.has(key);
  }
}
