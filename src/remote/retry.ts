import { setTimeout as sleep } from 'node:timers/promises';
import { RunCancelledError, isRetryable } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
}

/**
 * Run `operation` until it succeeds, throws a non-retryable error, or the
 * policy's attempts are used up. Backoff: base, 2x base, 4x base, ...
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const { signal } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new RunCancelledError();
    }
    try {
      return await operation(attempt);
    } catch (err) {
      if (!isRetryable(err)) {
        throw err;
      }
      lastError = err;
    }

    if (attempt + 1 < policy.maxAttempts) {
      const delay = backoffDelay(policy, attempt);
      try {
        await sleep(delay, undefined, { signal });
      } catch {
        throw new RunCancelledError();
      }
    }
  }

  throw lastError;
}
