/**
 * Tests for exponential backoff retry logic
 */

import {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  RetryLog,
  RetryPolicy,
  sleep,
  withRetry,
} from '../src/utils/retry.js';
import { RequestCancelledError } from '../src/core/errors.js';

class RetryableFailure extends Error {}

const isRetryable = (error: unknown) => error instanceof RetryableFailure;

describe('Retry Logic', () => {
  describe('backoffDelay', () => {
    it('should double the delay for each failed attempt', () => {
      expect(backoffDelay(1)).toBe(500);
      expect(backoffDelay(2)).toBe(1000);
      expect(backoffDelay(3)).toBe(2000);
    });

    it('should cap the delay at maxDelayMs', () => {
      expect(backoffDelay(4)).toBe(4000);
      expect(backoffDelay(5)).toBe(4000);
      expect(backoffDelay(10)).toBe(4000);
    });

    it('should use the supplied policy', () => {
      const policy: RetryPolicy = { maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 250, multiplier: 3 };
      expect(backoffDelay(1, policy)).toBe(100);
      expect(backoffDelay(2, policy)).toBe(250);
    });
  });

  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const sleepFn = jest.fn().mockResolvedValue(undefined);

      const result = await withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, sleep: sleepFn });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(fn).toHaveBeenCalledWith(1);
      expect(sleepFn).not.toHaveBeenCalled();
    });

    it('should retry retryable failures and eventually succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new RetryableFailure('Fail 1'))
        .mockRejectedValueOnce(new RetryableFailure('Fail 2'))
        .mockResolvedValueOnce('success');
      const sleepFn = jest.fn().mockResolvedValue(undefined);

      const result = await withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, sleep: sleepFn });

      expect(result).toBe('success');
      expect(fn.mock.calls).toEqual([[1], [2], [3]]);
      expect(sleepFn.mock.calls.map((call) => call[0])).toEqual([500, 1000]);
    });

    it('should log every attempt', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new RetryableFailure('Fail 1'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, DEFAULT_RETRY_POLICY, {
        isRetryable,
        sleep: async () => {},
        onLog: (log) => logs.push(log),
      });

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({ attempt: 1, success: false, error: 'Fail 1', nextRetryInMs: 500 });
      expect(logs[1]).toMatchObject({ attempt: 2, success: true });
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should rethrow the last error after max attempts', async () => {
      const last = new RetryableFailure('Fail 3');
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new RetryableFailure('Fail 1'))
        .mockRejectedValueOnce(new RetryableFailure('Fail 2'))
        .mockRejectedValueOnce(last);
      const sleepFn = jest.fn().mockResolvedValue(undefined);

      await expect(
        withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, sleep: sleepFn })
      ).rejects.toBe(last);

      expect(fn).toHaveBeenCalledTimes(3);
      expect(sleepFn).toHaveBeenCalledTimes(2);
    });

    it('should not retry non-retryable errors', async () => {
      const fatal = new Error('Fatal');
      const fn = jest.fn().mockRejectedValue(fatal);
      const sleepFn = jest.fn().mockResolvedValue(undefined);

      await expect(
        withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, sleep: sleepFn })
      ).rejects.toBe(fatal);

      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleepFn).not.toHaveBeenCalled();
    });

    it('should not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const fn = jest.fn().mockResolvedValue('success');

      await expect(
        withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);

      expect(fn).not.toHaveBeenCalled();
    });

    it('should stop at the next retry boundary once aborted', async () => {
      const controller = new AbortController();
      const fn = jest.fn().mockRejectedValue(new RetryableFailure('Fail'));
      const sleepFn = jest.fn(async () => {
        controller.abort();
      });

      await expect(
        withRetry(fn, DEFAULT_RETRY_POLICY, { isRetryable, signal: controller.signal, sleep: sleepFn })
      ).rejects.toBeInstanceOf(RequestCancelledError);

      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleepFn).toHaveBeenCalledTimes(1);
    });
  });

  describe('sleep', () => {
    it('should resolve after the delay', async () => {
      const start = Date.now();
      await sleep(20);
      expect(Date.now() - start).toBeGreaterThanOrEqual(15);
    });

    it('should resolve early when the signal aborts', async () => {
      const controller = new AbortController();
      const start = Date.now();
      const pending = sleep(10000, controller.signal);

      controller.abort();
      await pending;

      expect(Date.now() - start).toBeLessThan(1000);
    });
  });
});
