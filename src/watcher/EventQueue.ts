/**
 * EventQueue - Unbounded async channel between the watcher callbacks and the
 * consumer loop.
 */

export class EventQueue<T> implements AsyncIterable<T> {
  private items: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  /**
   * Enqueue an item. Returns false once the queue is closed.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  /**
   * Stop accepting items. Consumers drain what is queued, then finish.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T>> {
    const queued = this.items.shift();
    if (queued) {
      return Promise.resolve({ value: queued.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
