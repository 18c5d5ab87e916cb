/**
 * Unbounded single-consumer queue. The producer pushes without waiting; the
 * consumer iterates and is resumed as values arrive.
 */
export interface Channel<T> extends AsyncIterable<T> {
  push(value: T): void;
  close(): void;
  readonly closed: boolean;
}

export function createChannel<T>(): Channel<T> {
  const queue: T[] = [];
  let closed = false;
  let wake: (() => void) | null = null;

  const notify = (): void => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  async function* iterate(): AsyncGenerator<T> {
    while (true) {
      const next = queue.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  }

  return {
    push(value) {
      if (closed) return;
      queue.push(value);
      notify();
    },
    close() {
      closed = true;
      notify();
    },
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator]: iterate,
  };
}
