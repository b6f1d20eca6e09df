interface ConsumeWaiter<T> {
  resolve: (value: T) => void;
  /** Detaches the waiter's abort listener, if any. */
  release: () => void;
}

/**
 * Bounded async queue.
 * offer() never blocks and refuses items when full; consume() waits when empty.
 * Supports AbortSignal for clean shutdown.
 */
export class AsyncQueue<T> {
  private queue: T[] = [];
  private consumeWaiters: ConsumeWaiter<T>[] = [];
  private maxSize: number;

  constructor(maxSize = 100) {
    this.maxSize = maxSize;
  }

  /** Enqueue without waiting. Returns false when the queue is full. */
  offer(item: T): boolean {
    // If someone is waiting to consume, hand off directly
    const waiter = this.consumeWaiters.shift();
    if (waiter) {
      waiter.release();
      waiter.resolve(item);
      return true;
    }
    if (this.queue.length >= this.maxSize) return false;
    this.queue.push(item);
    return true;
  }

  async consume(signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    // If items available, return immediately
    const item = this.queue.shift();
    if (item !== undefined) return item;

    // Wait for an item
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.consumeWaiters.indexOf(entry);
        if (idx !== -1) this.consumeWaiters.splice(idx, 1);
        reject(new Error('Aborted'));
      };
      const entry: ConsumeWaiter<T> = {
        resolve,
        release: () => signal?.removeEventListener('abort', onAbort),
      };
      this.consumeWaiters.push(entry);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  get size(): number {
    return this.queue.length;
  }

  get pending(): number {
    return this.consumeWaiters.length;
  }

  get capacity(): number {
    return this.maxSize;
  }
}
