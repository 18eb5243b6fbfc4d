/**
 * Bounded async queue used as a channel between the orchestrator and workers
 */

interface Waiter<T> {
  resolve: (item: IteratorResult<T>) => void;
}

export class AsyncQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly takers: Waiter<T>[] = [];
  private readonly putters: Array<() => void> = [];
  private closed = false;

  /**
   * @param capacity - puts beyond this many buffered items wait for a take
   */
  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async put(item: T): Promise<void> {
    for (;;) {
      if (this.closed) {
        throw new Error("Cannot put to a closed queue");
      }

      const taker = this.takers.shift();
      if (taker) {
        taker.resolve({ value: item, done: false });
        return;
      }

      if (this.items.length < this.capacity) {
        this.items.push({ value: item });
        return;
      }

      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
  }

  /**
   * Next item, or `done` once the queue is closed and drained
   */
  async take(): Promise<IteratorResult<T>> {
    const entry = this.items.shift();
    if (entry) {
      this.putters.shift()?.();
      return { value: entry.value, done: false };
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise((resolve) => this.takers.push({ resolve }));
  }

  /** No further puts; pending takers are released once items run out */
  close(): void {
    this.closed = true;
    if (this.items.length === 0) {
      for (const taker of this.takers.splice(0)) {
        taker.resolve({ value: undefined, done: true });
      }
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    for (;;) {
      const next = await this.take();
      if (next.done) return;
      yield next.value;
    }
  }
}
