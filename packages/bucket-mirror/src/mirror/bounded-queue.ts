/**
 * Fixed-capacity async FIFO with one producer and many consumers.
 *
 * push() waits while the queue is full; shift() waits while it is empty
 * and still open. Each item is handed to exactly one shift() caller.
 * close() is called once by the producer; consumers then drain what is
 * left and receive `done`.
 */

interface Waiter {
  reject: (reason: unknown) => void;
  /** Detaches the abort listener once the waiter is settled */
  release?: () => void;
}

interface PendingShift<T> extends Waiter {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

interface PendingPush<T> extends Waiter {
  item: T;
  resolve: () => void;
}

export class BoundedQueue<T extends NonNullable<unknown>> {
  private readonly items: T[] = [];
  private readonly waitingConsumers: PendingShift<T>[] = [];
  private readonly waitingProducers: PendingPush<T>[] = [];
  private _closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Number of buffered items (excluding producers blocked on a full queue) */
  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Enqueue an item, waiting for room if the queue is full.
   * Rejects with the signal's reason if the signal aborts first.
   */
  push(item: T, signal?: AbortSignal): Promise<void> {
    if (this._closed) {
      return Promise.reject(new Error('Cannot push to a closed queue'));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const consumer = this.waitingConsumers.shift();
    if (consumer) {
      consumer.release?.();
      consumer.resolve({ done: false, value: item });
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.wait(this.waitingProducers, { item, resolve, reject }, signal);
    });
  }

  /**
   * Take the next item, waiting while the queue is open and empty.
   * Resolves `done` once the queue is closed and drained.
   */
  shift(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const item = this.items.shift();
    if (item !== undefined) {
      this.admitProducer();
      return Promise.resolve({ done: false, value: item });
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise<IteratorResult<T, undefined>>((resolve, reject) => {
      this.wait(this.waitingConsumers, { resolve, reject }, signal);
    });
  }

  /**
   * Mark the end of the stream. Idle consumers are released with `done`;
   * items already buffered are still delivered.
   */
  close(): void {
    if (this._closed) {
      throw new Error('Queue already closed');
    }
    this._closed = true;

    for (const consumer of this.waitingConsumers.splice(0)) {
      consumer.release?.();
      consumer.resolve({ done: true, value: undefined });
    }
  }

  /** Move one blocked producer's item into the buffer after a slot frees up */
  private admitProducer(): void {
    const producer = this.waitingProducers.shift();
    if (producer) {
      producer.release?.();
      this.items.push(producer.item);
      producer.resolve();
    }
  }

  private wait<W extends Waiter>(waiters: W[], waiter: W, signal: AbortSignal | undefined): void {
    waiters.push(waiter);
    if (!signal) return;

    const onAbort = (): void => {
      const index = waiters.indexOf(waiter);
      if (index !== -1) {
        waiters.splice(index, 1);
        waiter.reject(signal.reason);
      }
    };
    signal.addEventListener('abort', onAbort, { once: true });
    waiter.release = () => signal.removeEventListener('abort', onAbort);
  }
}
