export interface AsyncQueue<T> {
  push(item: T): void;
  /** Resolves with the next item, or undefined if none arrives within `timeoutMs`. */
  pop(timeoutMs: number): Promise<T | undefined>;
}

export function createAsyncQueue<T>(): AsyncQueue<T> {
  const items: T[] = [];
  const waiters: Array<(item: T) => void> = [];

  return {
    push(item) {
      const waiter = waiters.shift();
      if (waiter) {
        waiter(item);
      } else {
        items.push(item);
      }
    },

    pop(timeoutMs) {
      if (items.length > 0) {
        return Promise.resolve(items.shift());
      }

      return new Promise<T | undefined>((resolve) => {
        const waiter = (item: T) => {
          clearTimeout(timer);
          resolve(item);
        };
        const timer = setTimeout(() => {
          const i = waiters.indexOf(waiter);
          if (i !== -1) waiters.splice(i, 1);
          resolve(undefined);
        }, timeoutMs);
        waiters.push(waiter);
      });
    },
  };
}
