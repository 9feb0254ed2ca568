/**
 * Async FIFO with a fixed capacity. `push` waits while the queue is full, the consumer
 * iterates with `for await` until `close()` is called and the buffer is drained.
 */
export class BoundedQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly pushWaiters: Array<() => void> = [];
  private readonly pullWaiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  async push(value: T): Promise<void> {
    while (!this.closed && this.pullWaiters.length === 0 && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.pushWaiters.push(resolve));
    }
    if (this.closed) throw new Error("Queue is closed");

    const waiter = this.pullWaiters.shift();
    if (waiter) waiter({ done: false, value });
    else this.items.push({ value });
  }

  pull(): Promise<IteratorResult<T, undefined>> {
    const next = this.items.shift();
    if (next) {
      this.pushWaiters.shift()?.();
      return Promise.resolve({ done: false, value: next.value });
    }
    if (this.closed) return Promise.resolve({ done: true, value: undefined });
    return new Promise((resolve) => this.pullWaiters.push(resolve));
  }

  /** No more pushes. Buffered items are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.pullWaiters.splice(0)) waiter({ done: true, value: undefined });
    for (const waiter of this.pushWaiters.splice(0)) waiter();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.pull();
      if (result.done) return;
      yield result.value;
    }
  }
}
