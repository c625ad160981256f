import { QueueClosedError } from '../domain/errors.js';

interface Slot<T> {
  readonly item: T;
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
}

/**
 * Fixed-capacity FIFO shared between many producers and one consumer.
 *
 * Node.js runs producers and the consumer on one thread, so `tryEnqueue`
 * and the synchronous part of `dequeue` never interleave. The only
 * coordination needed is parking the consumer while the queue is empty.
 *
 * Items live in a ring buffer sized to `capacity`. A parked consumer is
 * handed the next item directly, without it touching the buffer.
 */
export class BoundedQueue<T> {
  private readonly buffer: Array<Slot<T> | undefined>;
  private head = 0;
  private count = 0;
  private waiter: Waiter<T> | null = null;
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<Slot<T> | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Offers an item without waiting.
   * Returns false when the queue is full or closed; the caller owns the drop.
   */
  tryEnqueue(item: T): boolean {
    if (this.isClosed) return false;

    if (this.waiter !== null) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(item);
      return true;
    }

    if (this.count === this.capacity) return false;

    this.buffer[(this.head + this.count) % this.capacity] = { item };
    this.count++;
    return true;
  }

  /**
   * Takes the oldest item, suspending while the queue is empty.
   *
   * Single consumer only: a second concurrent call is a programming error.
   * Rejects with the signal's reason when aborted while waiting, and with
   * QueueClosedError when the queue is closed and has nothing left.
   */
  dequeue(signal?: AbortSignal): Promise<T> {
    if (this.count > 0) {
      return Promise.resolve(this.shift());
    }
    if (this.isClosed) {
      return Promise.reject(new QueueClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error('BoundedQueue supports a single waiting consumer'));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(signal?.reason);
      };

      this.waiter = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject: (reason) => {
          signal?.removeEventListener('abort', onAbort);
          reject(reason);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Stops accepting new items. Items already queued remain dequeuable;
   * a consumer parked on an empty queue is released with QueueClosedError.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    if (this.waiter !== null) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(new QueueClosedError());
    }
  }

  private shift(): T {
    const slot = this.buffer[this.head];
    if (slot === undefined) {
      throw new Error('BoundedQueue invariant violated: empty slot at head');
    }
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return slot.item;
  }
}
