export type PutResult = { ok: true } | { ok: false; reason: 'closed' | 'aborted' };

export type TakeResult<T> = { done: false; value: T } | { done: true };

interface PendingPut<T> {
  value: T;
  settle: (result: PutResult) => void;
}

const CLOSED: PutResult = { ok: false, reason: 'closed' };
const ABORTED: PutResult = { ok: false, reason: 'aborted' };
const ACCEPTED: PutResult = { ok: true };

/**
 * FIFO queue with a fixed capacity. `put` suspends while the buffer is full
 * and `take` suspends while it is empty. Closing rejects every later and every
 * parked put; values already buffered stay available to `take`.
 *
 * A capacity of 0 makes every put wait for a taker.
 */
export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly buffer: T[] = [];
  private readonly putters: Array<PendingPut<T>> = [];
  private readonly takers: Array<(result: TakeResult<T>) => void> = [];
  private closedFlag = false;

  constructor(capacity: number) {
    this.capacity = Math.max(0, Math.floor(capacity));
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  /** Buffered values, not counting parked puts. */
  get size(): number {
    return this.buffer.length;
  }

  get pendingPuts(): number {
    return this.putters.length;
  }

  put(value: T, signal?: AbortSignal): Promise<PutResult> {
    if (this.closedFlag) {
      return Promise.resolve(CLOSED);
    }
    if (signal?.aborted) {
      return Promise.resolve(ABORTED);
    }

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value });
      return Promise.resolve(ACCEPTED);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve(ACCEPTED);
    }

    return new Promise<PutResult>((resolve) => {
      const onAbort = () => {
        this.removePutter(pending);
        resolve(ABORTED);
      };

      const pending: PendingPut<T> = {
        value,
        settle: (result) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.putters.push(pending);
    });
  }

  take(): Promise<TakeResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.admitNextPutter();
      return Promise.resolve({ done: false, value });
    }

    const putter = this.putters.shift();
    if (putter) {
      putter.settle(ACCEPTED);
      return Promise.resolve({ done: false, value: putter.value });
    }

    if (this.closedFlag) {
      return Promise.resolve({ done: true });
    }

    return new Promise<TakeResult<T>>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /** Returns `true` for the call that closed the queue. */
  close(): boolean {
    if (this.closedFlag) {
      return false;
    }
    this.closedFlag = true;

    // takers only wait on an empty buffer
    for (const taker of this.takers.splice(0)) {
      taker({ done: true });
    }
    for (const putter of this.putters.splice(0)) {
      putter.settle(CLOSED);
    }
    return true;
  }

  private admitNextPutter() {
    const next = this.putters.shift();
    if (next) {
      this.buffer.push(next.value);
      next.settle(ACCEPTED);
    }
  }

  private removePutter(pending: PendingPut<T>) {
    const idx = this.putters.indexOf(pending);
    if (idx >= 0) {
      this.putters.splice(idx, 1);
    }
  }
}
