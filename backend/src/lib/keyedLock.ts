/**
 * Runs async tasks one at a time per key. Tasks under different keys run freely.
 * A failing task does not block the ones queued behind it.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  // Number of keys with queued or running work
  get pendingKeys(): number {
    return this.tails.size;
  }
}
