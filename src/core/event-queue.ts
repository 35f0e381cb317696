type Waiter<T> = (result: IteratorResult<T>) => void;

/**
 * Bounded single-consumer queue. Producers never block: when the queue is full
 * the oldest item is dropped and handed to `onDrop`.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly capacity = 256,
    private readonly onDrop?: (item: T) => void,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    if (this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      this.droppedCount += 1;
      if (dropped !== undefined) this.onDrop?.(dropped);
    }
    this.items.push(item);
    return true;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item, ...rest] = this.items;
      this.items = rest;
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolvePromise) => {
      this.waiters.push(resolvePromise);
    });
  }

  /** Ends iteration once the buffered items are consumed. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ value: undefined, done: true });
    }
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
