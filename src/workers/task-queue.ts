type Waiter<T> = {
  resolve: (item: T | null) => void;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * Task Queue
 *
 * In-memory FIFO handing worker messages to the aggregator. Any number of
 * producers push; a single consumer pops with a timeout. Items are delivered in
 * push order, and each item is delivered exactly once.
 */
export class TaskQueue<T> {
  private items: T[];
  private waiters: Waiter<T>[];

  constructor() {
    this.items = [];
    this.waiters = [];
  }

  /**
   * Enqueue an item, handing it straight to a waiting consumer if there is one
   */
  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Dequeue the next item, waiting up to `timeoutMs`.
   * Resolves `null` when the timeout expires first.
   */
  pop(timeoutMs: number): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      return Promise.resolve(item === undefined ? null : item);
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Drop queued items and release waiting consumers with `null`
   */
  close(): void {
    this.items = [];
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
    this.waiters = [];
  }
}
