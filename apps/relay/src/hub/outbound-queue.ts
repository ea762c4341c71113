/**
 * Bounded FIFO feeding one subscriber's writer.
 *
 * Producers never wait: tryEnqueue reports a full or closed queue by returning false.
 * The single consumer drains it with `for await`, which suspends while the queue is
 * empty and finishes once the queue is closed and its buffered items are consumed.
 */
export class OutboundQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`OutboundQueue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  tryEnqueue(item: T): boolean {
    if (this.closed) return false;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return true;
    }

    if (this.items.length >= this.capacity) return false;
    this.items.push({ value: item });
    return true;
  }

  /** Idempotent. Wakes a consumer blocked on an empty queue. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const head = this.items.shift();
    if (head) {
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('OutboundQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
