/**
 * Unbounded FIFO with awaitable reads.
 */

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

export class AsyncQueue<T> {
  private _items: { value: T }[] = [];
  private _waiters: Waiter<T>[] = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Number of buffered items nobody has read yet.
   */
  get size(): number {
    return this._items.length;
  }

  push(item: T): void {
    if (this._closed) return;

    const waiter = this._waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: item });
      return;
    }
    this._items.push({ value: item });
  }

  /**
   * Take the next item, waiting if the queue is empty. Resolves `done` once the
   * queue is closed and drained.
   *
   * Aborting `signal` rejects the pending read with the signal's reason (an
   * `AbortError` unless one was given) and withdraws it, so the next item
   * stays in the queue for later reads.
   */
  shift(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    const buffered = this._items.shift();
    if (buffered) {
      return Promise.resolve({ done: false, value: buffered.value });
    }
    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (!signal) {
      return new Promise((resolve) => {
        this._waiters.push({ resolve });
      });
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this._waiters.indexOf(waiter);
        if (index !== -1) this._waiters.splice(index, 1);
        reject(signal.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (result) => {
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };
      this._waiters.push(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Stop accepting items and release pending readers. Buffered items stay
   * readable.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    const waiters = this._waiters;
    this._waiters = [];
    for (const waiter of waiters) {
      waiter.resolve({ done: true, value: undefined });
    }
  }
}
