/**
 * Serializes async work per key. Calls for the same key run one after the
 * other in arrival order; different keys run in parallel.
 */
export class PerKeyLock<TKey = string> {
  private readonly chains = new Map<TKey, Promise<void>>();

  async runExclusive<T>(key: TKey, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = previous.then(() => done);
    this.chains.set(key, chain);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) {
          this.chains.delete(key);
        }
      });
    }
  }

  get activeCount(): number {
    return this.chains.size;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.chains.values()]);
  }
}
