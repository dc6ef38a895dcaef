/**
 * Push-to-pull bridge: callback-style producers (realtime channels, test
 * fakes) push values, a single `for await` consumer pulls them.
 *
 * `return()` on the iterator settles any pending read with `done`, so a
 * consumer blocked on `next()` wakes up when the stream is closed.
 */
export type EventQueue<T> = AsyncIterable<T> & {
  push: (value: T) => void;
  fail: (error: unknown) => void;
  close: () => void;
  readonly closed: boolean;
};

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
};

export function createEventQueue<T>(onClose?: () => void | Promise<void>): EventQueue<T> {
  const buffered: T[] = [];
  const waiters: Waiter<T>[] = [];
  let failure: { error: unknown } | null = null;
  let closed = false;

  function finish(): void {
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  const iterator: AsyncIterator<T> = {
    next() {
      const value = buffered.shift();
      if (value !== undefined) return Promise.resolve<IteratorResult<T>>({ value, done: false });
      if (failure) {
        const { error } = failure;
        failure = null;
        closed = true;
        return Promise.reject(error);
      }
      if (closed) return Promise.resolve<IteratorResult<T>>({ value: undefined, done: true });
      return new Promise<IteratorResult<T>>((resolve, reject) => waiters.push({ resolve, reject }));
    },
    async return(): Promise<IteratorResult<T>> {
      if (!closed) {
        finish();
        await onClose?.();
      }
      return { value: undefined, done: true };
    },
  };

  return {
    push(value) {
      if (closed) return;
      const waiter = waiters.shift();
      if (waiter) waiter.resolve({ value, done: false });
      else buffered.push(value);
    },
    fail(error) {
      if (closed) return;
      const waiter = waiters.shift();
      if (waiter) {
        closed = true;
        waiter.reject(error);
        finish();
      } else {
        failure = { error };
      }
    },
    close() {
      if (!closed) finish();
    },
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator]: () => iterator,
  };
}
