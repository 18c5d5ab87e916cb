export const DEFAULT_FLUSH_INTERVAL_MS = 90;

export interface UpdateCoalescerOptions {
  intervalMs?: number;
  onFlush: (text: string) => void;
  /** Polled on each tick; the timer stops once this is false and nothing is pending. */
  isActive: () => boolean;
}

export interface UpdateCoalescer {
  push(text: string): void;
  /** Delivers pending text now, if any. */
  flush(): void;
  /** Final flush, then stops the timer. */
  drain(): void;
  readonly pending: string;
  readonly running: boolean;
}

/**
 * Batches many small deltas into display updates delivered at most once per
 * interval, independent of how the network chunked them.
 */
export function createUpdateCoalescer(options: UpdateCoalescerOptions): UpdateCoalescer {
  const intervalMs = options.intervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
  let pending = '';
  let timer: ReturnType<typeof setInterval> | null = null;

  const flush = (): void => {
    if (!pending) return;
    const text = pending;
    pending = '';
    options.onFlush(text);
  };

  const stop = (): void => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  };

  const tick = (): void => {
    flush();
    if (!options.isActive() && !pending) {
      stop();
    }
  };

  return {
    push(text) {
      if (!text) return;
      pending += text;
      if (timer === null) {
        timer = setInterval(tick, intervalMs);
      }
    },
    flush,
    drain() {
      flush();
      stop();
    },
    get pending() {
      return pending;
    },
    get running() {
      return timer !== null;
    },
  };
}
