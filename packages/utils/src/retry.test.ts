import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  retryWithBackoff,
  retry,
  calculateBackoffDelay,
  isRetryableError,
  isRetryableStatusCode,
  RETRY_PROFILES,
} from './retry';

describe('Retry Utilities', () => {
  describe('calculateBackoffDelay', () => {
    it('should calculate exponential delay correctly', () => {
      const config = {
        initialDelayMs: 100,
        maxDelayMs: 10000,
        backoffMultiplier: 2,
        jitterFactor: 0,
      };

      expect(calculateBackoffDelay(0, config)).toBe(100);
      expect(calculateBackoffDelay(1, config)).toBe(200);
      expect(calculateBackoffDelay(2, config)).toBe(400);
      expect(calculateBackoffDelay(3, config)).toBe(800);
    });

    it('should cap delay at maxDelayMs', () => {
      const config = {
        initialDelayMs: 250,
        maxDelayMs: 2000,
        backoffMultiplier: 2,
        jitterFactor: 0,
      };

      expect(calculateBackoffDelay(3, config)).toBe(2000);
      expect(calculateBackoffDelay(10, config)).toBe(2000);
    });

    it('should keep jitter within the configured range', () => {
      const delays = Array.from({ length: 100 }, () =>
        calculateBackoffDelay(0, RETRY_PROFILES.EXCHANGE_READ)
      );

      // 250ms base with 20% jitter
      expect(Math.min(...delays)).toBeGreaterThanOrEqual(200);
      expect(Math.max(...delays)).toBeLessThanOrEqual(300);
    });
  });

  describe('isRetryableError', () => {
    it('should return true for network errors', () => {
      expect(isRetryableError(new Error('ECONNREFUSED'))).toBe(true);
      expect(isRetryableError(new Error('read ECONNRESET'))).toBe(true);
      expect(isRetryableError(new Error('Network error'))).toBe(true);
      expect(isRetryableError(new Error('socket hang up'))).toBe(true);
    });

    it('should return true for timeout errors', () => {
      expect(isRetryableError(new Error('Request timeout'))).toBe(true);
      expect(isRetryableError(new Error('Connection timed out'))).toBe(true);
    });

    it('should use the status attached to the error', () => {
      const rateLimited = Object.assign(new Error('Too many requests'), { status: 429 });
      const unavailable = Object.assign(new Error('Service unavailable'), { statusCode: 503 });
      const badRequest = Object.assign(new Error('invalid price'), { status: 400 });

      expect(isRetryableError(rateLimited)).toBe(true);
      expect(isRetryableError(unavailable)).toBe(true);
      expect(isRetryableError(badRequest)).toBe(false);
    });

    it('should return false for non-Error values', () => {
      expect(isRetryableError('string error')).toBe(false);
      expect(isRetryableError(null)).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });
  });

  describe('isRetryableStatusCode', () => {
    it('should retry rate limits and server errors only', () => {
      expect(isRetryableStatusCode(429)).toBe(true);
      expect(isRetryableStatusCode(500)).toBe(true);
      expect(isRetryableStatusCode(599)).toBe(true);
      expect(isRetryableStatusCode(200)).toBe(false);
      expect(isRetryableStatusCode(401)).toBe(false);
      expect(isRetryableStatusCode(404)).toBe(false);
    });
  });

  describe('retryWithBackoff', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should succeed on first attempt without retry', async () => {
      const fn = vi.fn().mockResolvedValue('success');

      const result = await retryWithBackoff(fn);

      expect(result).toMatchObject({ success: true, data: 'success', attempts: 1 });
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('ECONNREFUSED'))
        .mockRejectedValueOnce(new Error('ETIMEDOUT'))
        .mockResolvedValue('success');

      const promise = retryWithBackoff(fn, { initialDelayMs: 10, maxRetries: 3 });
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toMatchObject({ success: true, data: 'success', attempts: 3 });
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should fail after exhausting all retries', async () => {
      const error = new Error('ECONNREFUSED');
      const fn = vi.fn().mockRejectedValue(error);

      const promise = retryWithBackoff(fn, { maxRetries: 2, initialDelayMs: 10 });
      await vi.runAllTimersAsync();
      const result = await promise;

      expect(result).toMatchObject({ success: false, error, attempts: 3 });
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should stop retrying on non-retryable errors', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('not enough balance / allowance'));

      const result = await retryWithBackoff(fn, { maxRetries: 3, initialDelayMs: 10 });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
    });

    it('should call onRetry before each retry', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValue('success');
      const onRetry = vi.fn();

      const promise = retryWithBackoff(fn, { maxRetries: 3, initialDelayMs: 10, onRetry });
      await vi.runAllTimersAsync();
      await promise;

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, expect.any(Number));
    });
  });

  describe('retry', () => {
    it('should return the value on success', async () => {
      await expect(retry(() => Promise.resolve(42))).resolves.toBe(42);
    });

    it('should throw the last error on failure', async () => {
      const error = new Error('invalid signature');
      await expect(retry(() => Promise.reject(error), { maxRetries: 0 })).rejects.toBe(error);
    });
  });
});
