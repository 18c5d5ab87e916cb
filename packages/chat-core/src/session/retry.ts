import { toCodepaneError, type CodepaneError } from '@codepane/shared-types';

export interface RetryPolicy {
  /** Total attempts, the first one included. Capped at three. */
  maxAttempts: number;
  backoffMs: number;
}

export const MAX_RETRY_ATTEMPTS = 3;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: MAX_RETRY_ATTEMPTS,
  backoffMs: 5_000,
};

export interface RetryLog {
  attempt: number;
  status: number;
  error: string;
  nextRetryInMs: number;
}

/** Only rate limiting and timeouts are worth another attempt. */
export function isRetryableFailure(error: CodepaneError): boolean {
  if (error.code === 'http_status') {
    return error.status === 429;
  }
  return error.code === 'transport' && error.retryable;
}

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (!ms || ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the attempts are
 * used up. Backoff is fixed.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: { signal?: AbortSignal; onRetry?: (log: RetryLog) => void } = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.min(policy.maxAttempts, MAX_RETRY_ATTEMPTS));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      const failure = toCodepaneError(error);
      if (attempt >= maxAttempts || !isRetryableFailure(failure) || options.signal?.aborted) {
        throw failure;
      }
      options.onRetry?.({
        attempt,
        status: failure.status,
        error: failure.message,
        nextRetryInMs: policy.backoffMs,
      });
      await wait(policy.backoffMs, options.signal);
    }
  }
}
