/**
 * FIFO queue with a fixed capacity. `push` waits while the queue is full,
 * which is how a slow consumer holds back its producer.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;
  private waitingReaders: Array<() => void> = [];
  private waitingWriters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<void> {
    while (this.items.length >= this.capacity && !this.closed) {
      await new Promise<void>((resolve) => this.waitingWriters.push(resolve));
    }
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }
    this.items.push(item);
    wakeAll(this.waitingReaders);
  }

  /** No more items; readers drain what is left, then finish. */
  close(): void {
    this.closed = true;
    wakeAll(this.waitingReaders);
    wakeAll(this.waitingWriters);
  }

  /** Like {@link close}, but readers throw `error` once drained. */
  fail(error: unknown): void {
    if (!this.closed) {
      this.failure = { error };
    }
    this.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      if (this.items.length > 0) {
        const [item] = this.items.splice(0, 1);
        wakeAll(this.waitingWriters);
        yield item;
        continue;
      }
      if (this.failure) {
        throw this.failure.error;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => this.waitingReaders.push(resolve));
    }
  }
}

function wakeAll(waiters: Array<() => void>): void {
  for (const wake of waiters.splice(0)) {
    wake();
  }
}
