/**
 * Runs tasks one at a time per key, in submission order. Different keys run
 * concurrently. A rejected task does not block the tasks queued behind it.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Resolves once everything queued for the key so far has settled. */
  async drain(key: string): Promise<void> {
    await this.tails.get(key);
  }

  async drainAll(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}
