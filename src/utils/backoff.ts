import { CancelledError, NetworkFailureError } from '../services/cache/errors';

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  factor: 2,
};

/**
 * Delay before retry number `retry` (1 = first retry).
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.factor, retry - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Resolves after `ms`, or rejects with CancelledError when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Network errors are retried unless the server said the object is not there. */
export function isRetryable(err: unknown): boolean {
  if (err instanceof NetworkFailureError) return err.retryable;
  // fetch() rejects with TypeError when the connection itself fails
  return err instanceof TypeError;
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: {
    signal?: AbortSignal;
    onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  } = {},
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !isRetryable(err) || options.signal?.aborted) {
        throw err;
      }
      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(attempt, err, delay);
      await sleep(delay, options.signal);
    }
  }
}
