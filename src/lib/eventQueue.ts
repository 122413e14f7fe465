type Waiter<T> = (value: T | null) => void;

/**
 * Single-consumer FIFO that merges events from several producers in arrival
 * order. `next()` resolves to null once the queue is closed and drained.
 */
export class EventQueue<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  push(event: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.buffer.push(event);
    }
  }

  next(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const [event] = this.buffer.splice(0, 1);
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  get size(): number {
    return this.buffer.length;
  }
}
