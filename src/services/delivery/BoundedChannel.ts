/**
 * Single-consumer async queue with a fixed capacity. push() never blocks:
 * when the buffer is full the oldest item is discarded.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;
  private dropped = 0;
  private readonly capacity: number;
  private readonly onDrop?: (item: T) => void;

  constructor(capacity: number, onDrop?: (item: T) => void) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("capacity must be a positive integer");
    }
    this.capacity = capacity;
    this.onDrop = onDrop;
  }

  get size(): number {
    return this.buffer.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      const discarded = this.buffer.shift();
      this.dropped++;
      if (discarded !== undefined) {
        this.onDrop?.(discarded);
      }
    }
    this.buffer.push(item);
    return true;
  }

  // Buffered items are still delivered after close
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.buffer = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
