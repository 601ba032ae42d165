type PendingRead<T> = (result: IteratorResult<T>) => void;

/**
 * Unbounded single-consumer queue exposed as an async iterable. Values are
 * delivered in push order; `close()` ends iteration once the buffer drains.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  readonly #buffer: T[] = [];
  readonly #pendingReads: PendingRead<T>[] = [];
  #closed = false;

  get closed(): boolean {
    return this.#closed;
  }

  push(value: T): boolean {
    if (this.#closed) {
      return false;
    }

    const pendingRead = this.#pendingReads.shift();
    if (pendingRead) {
      pendingRead({ value, done: false });
      return true;
    }

    this.#buffer.push(value);
    return true;
  }

  close(): void {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    for (const pendingRead of this.#pendingReads.splice(0)) {
      pendingRead({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.#buffer.length > 0) {
      const [value] = this.#buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.#closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise<IteratorResult<T>>(resolve => {
      this.#pendingReads.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        this.#buffer.length = 0;
        return { value: undefined, done: true };
      },
    };
  }
}
