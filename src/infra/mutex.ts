// FIFO; released once fn settles, even when it throws.
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => { release = resolve; });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
