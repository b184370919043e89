/**
 * Unbounded single-consumer channel. Items are read in write order. After
 * `complete()` every read ends.
 */
export class AsyncQueue<T> {
  private readonly items: { value: T }[] = [];
  private readers: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private completed = false;

  public get size(): number {
    return this.items.length;
  }

  public get isCompleted(): boolean {
    return this.completed;
  }

  /** Returns false when the queue no longer accepts items. */
  public write(item: T): boolean {
    if (this.completed) return false;

    const reader = this.readers.shift();
    if (reader) {
      reader({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  /** Stops accepting writes. Returns the items no reader has taken. */
  public complete(): T[] {
    if (this.completed) return [];
    this.completed = true;

    const readers = this.readers;
    this.readers = [];
    for (const reader of readers) reader({ value: undefined, done: true });

    return this.items.splice(0).map((entry) => entry.value);
  }

  public read(): Promise<IteratorResult<T, undefined>> {
    const next = this.items.shift();
    if (next) {
      return Promise.resolve({ value: next.value, done: false });
    }
    if (this.completed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.readers.push(resolve));
  }

  public async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.read();
      if (result.done) return;
      yield result.value;
    }
  }
}
