/**
 * Exponential backoff retry for calls to the model API
 */

import { RequestCancelledError } from '../core/errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: SleepFn;
  onLog?: (log: RetryLog) => void;
}

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Executes a function with exponential backoff retry logic.
 * Non-retryable errors and the error of the last attempt are rethrown as-is.
 * An aborted signal stops the loop at the next retry boundary.
 * @param fn - Async function to execute, given the current attempt number
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const sleepFn = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }

    try {
      const result = await fn(attempt);
      options.onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      const canRetry = attempt < policy.maxAttempts && options.isRetryable(error);
      const nextRetryInMs = canRetry ? backoffDelay(attempt, policy) : undefined;

      options.onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs,
      });

      if (nextRetryInMs === undefined) {
        throw error;
      }

      await sleepFn(nextRetryInMs, options.signal);
    }
  }
}

/**
 * Sleep that resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
