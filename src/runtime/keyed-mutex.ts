/**
 * Per-key exclusive sections.
 *
 * Work for one key runs strictly one at a time, in arrival order; different
 * keys never wait on each other. The lifecycle manager and reconciliation
 * engine both lock on the symbol before touching a position.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  lockedKeys(): string[] {
    return [...this.tails.keys()];
  }
}
