/**
 * Serializes async tasks that share a key. Tasks under different keys run
 * independently. A rejected task rejects its own caller and does not block
 * the tasks queued behind it.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The queue only needs to know when the task settled; its outcome goes to the caller.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  pendingKeys(): number {
    return this.tails.size;
  }
}
