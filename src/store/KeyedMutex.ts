/**
 * KeyedMutex: critical sections queued per key.
 *
 * Sections sharing a key run one after another in arrival order; sections
 * under different keys run concurrently. A key's queue entry is dropped
 * once its last section settles.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T>): Promise<T> {
    const ahead = this.queues.get(key) ?? Promise.resolve();
    const result = ahead.then(section);
    const done = result.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, done);
    try {
      return await result;
    } finally {
      if (this.queues.get(key) === done) this.queues.delete(key);
    }
  }

  /** Keys with a section running or queued */
  get activeKeys(): string[] {
    return [...this.queues.keys()];
  }
}
