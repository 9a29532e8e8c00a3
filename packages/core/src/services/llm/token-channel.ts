/**
 * Single-consumer async channel
 *
 * A producer pushes values and closes the channel; the consumer iterates with
 * `for await`. Breaking out of the loop (or calling `cancel`) aborts `signal`
 * so the producer can stop and write its terminal value.
 */

export class TokenChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly controller = new AbortController();
  private closed = false;

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Returns false if the channel was already closed
   */
  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  cancel(): void {
    this.controller.abort();
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  /**
   * Drain the channel into an array
   */
  async collect(): Promise<T[]> {
    const values: T[] = [];
    for await (const value of this) {
      values.push(value);
    }
    return values;
  }
}
