type PendingRead<T> = {
  resolve: (value: IteratorResult<T, void>) => void;
};

/**
 * Unbounded single-consumer async queue. `push` never blocks; the consumer
 * drains with `for await`. After `end()` buffered items are still delivered.
 */
export class Pushable<T> implements AsyncIterable<T> {
  private queue: Array<{ item: T }> = [];
  private readers: PendingRead<T>[] = [];
  private closed = false;

  get ended(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve({ value: item, done: false });
    } else {
      this.queue.push({ item });
    }
    return true;
  }

  end(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const reader of this.readers.splice(0)) {
      reader.resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, void>> {
    const entry = this.queue.shift();
    if (entry) {
      return Promise.resolve({ value: entry.item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.readers.push({ resolve }));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, void> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end();
        return { value: undefined, done: true };
      },
    };
  }
}
