/**
 * Retry policies with exponential backoff for external calls
 */

import { Logger, errorMessage, sleep } from '../utils';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the next attempt, given the 1-based number of the attempt that just failed */
  backoff: (attempt: number) => number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export interface BackoffOptions {
  multiplierMs: number;
  minMs: number;
  maxMs: number;
}

export function exponentialBackoff({ multiplierMs, minMs, maxMs }: BackoffOptions): (attempt: number) => number {
  return attempt => Math.min(Math.max(multiplierMs * Math.pow(2, attempt), minMs), maxMs);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Errors that carry an HTTP status are only retried for timeouts, conflicts,
 * rate limits and server errors. Everything else (network failures, aborts,
 * malformed responses) is assumed transient.
 */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status === undefined) {
    return true;
  }
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export const FETCH_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  backoff: exponentialBackoff({ multiplierMs: 1000, minMs: 2000, maxMs: 10000 }),
  isRetryable: isTransientError,
};

export const MODEL_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  backoff: exponentialBackoff({ multiplierMs: 2000, minMs: 4000, maxMs: 65000 }),
  isRetryable: isTransientError,
};

export function withSleep(policy: RetryPolicy, sleepFn: (ms: number) => Promise<void>): RetryPolicy {
  return { ...policy, sleep: sleepFn };
}

export async function retryWithPolicy<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  label: string
): Promise<T> {
  const wait = policy.sleep ?? sleep;
  const isRetryable = policy.isRetryable ?? isTransientError;

  let lastError: unknown = new Error(`${label}: no attempts made`);

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        Logger.error(`${label} failed with a non-retryable error`, {
          attempt,
          status: statusOf(error),
          error: errorMessage(error),
        });
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        Logger.error(`${label} exhausted its retries`, {
          maxAttempts: policy.maxAttempts,
          error: errorMessage(error),
        });
        break;
      }

      const delay = policy.backoff(attempt);
      Logger.warn(`${label} failed, retrying with backoff`, {
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        error: errorMessage(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}
