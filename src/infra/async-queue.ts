/**
 * Async Queue
 *
 * Unbounded FIFO bridging push-style producers (socket events, the router)
 * and a pull-style consumer. Once failed, buffered items are still handed
 * out in order and every later `shift()` rejects with the failure.
 */

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private failure: Error | null = null;

  get size(): number {
    return this.items.length;
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  push(item: T): void {
    if (this.failure) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Terminate the queue. Only the first failure is kept.
   */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  shift(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      yield await this.shift();
    }
  }
}
