import { describe, it, expect, vi } from 'vitest';
import { withRetry, retry, calculateDelay, isRetryable, DEFAULT_RETRY_CONFIG } from '../src/utils/retry';
import { NetworkError, RateLimitError, SymbolNotFoundError, AuthenticationError } from '../src/utils/errors';

describe('Retry utilities', () => {
  describe('withRetry', () => {
    it('should succeed on first try', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op');

      expect(result).toEqual({ success: true, data: 'success', attempts: 1, totalDelayMs: 0 });
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should retry on retryable failure and eventually succeed', async () => {
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new NetworkError('fail1'))
        .mockRejectedValueOnce(new NetworkError('fail2'))
        .mockResolvedValue('success');

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 5,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(true);
      expect(result.success ? result.data : null).toBe('success');
      expect(result.attempts).toBe(3);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should pass the attempt number to the operation', async () => {
      const operation = vi.fn().mockRejectedValueOnce(new NetworkError('fail')).mockResolvedValue('ok');

      await withRetry(operation, 'test-op', { initialDelayMs: 1 });

      expect(operation.mock.calls).toEqual([[1], [2]]);
    });

    it('should fail after max attempts with retryable error', async () => {
      const operation = vi.fn().mockRejectedValue(new NetworkError('always fails'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 3,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(false);
      expect(result.success ? null : result.error.message).toBe('always fails');
      expect(result.attempts).toBe(3);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should report each scheduled retry', async () => {
      const onRetry = vi.fn();
      const operation = vi.fn().mockRejectedValueOnce(new RateLimitError(5)).mockResolvedValue('ok');

      await withRetry(operation, 'krx.daily', { onRetry });

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry.mock.calls[0][0]).toMatchObject({ operation: 'krx.daily', attempt: 1, delayMs: 5 });
    });

    it('should normalise plain errors into the taxonomy', async () => {
      const result = await withRetry(async () => Promise.reject(new Error('bad input')), 'test-op');

      expect(result.success ? null : result.error.reason).toBe('system_error');
      expect(result.attempts).toBe(1);
    });

    it('should not retry permanent errors', async () => {
      const operation = vi.fn().mockRejectedValue(new SymbolNotFoundError('ZZZZ'));

      const result = await withRetry(operation, 'test-op', {
        maxAttempts: 5,
        initialDelayMs: 10,
      });

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(1);
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('retry function', () => {
    it('should return the value once the operation succeeds', async () => {
      let attempts = 0;
      const flaky = async () => {
        attempts++;
        if (attempts < 3) throw new NetworkError('not yet');
        return 'done';
      };

      const result = await retry(flaky, 'flaky', { maxAttempts: 5, initialDelayMs: 10 });

      expect(result).toBe('done');
      expect(attempts).toBe(3);
    });

    it('should throw on final failure', async () => {
      const failing = async () => {
        throw new NetworkError('always fails');
      };

      await expect(retry(failing, 'failing', { maxAttempts: 2, initialDelayMs: 10 })).rejects.toThrow('always fails');
    });
  });

  describe('calculateDelay', () => {
    const config = { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 100, maxDelayMs: 300, jitterFactor: 0 };

    it('should back off exponentially up to the cap', () => {
      expect(calculateDelay(1, config)).toBe(100);
      expect(calculateDelay(2, config)).toBe(200);
      expect(calculateDelay(3, config)).toBe(300);
    });

    it('should honour a Retry-After hint', () => {
      expect(calculateDelay(1, config, new RateLimitError(250))).toBe(250);
      expect(calculateDelay(1, config, new RateLimitError(5000))).toBe(300);
    });
  });

  describe('isRetryable', () => {
    it('should follow the error classification', () => {
      expect(isRetryable(new NetworkError('reset'))).toBe(true);
      expect(isRetryable(new AuthenticationError())).toBe(false);
    });

    it('should recognise network failures from plain errors', () => {
      expect(isRetryable(new Error('read ECONNRESET'))).toBe(true);
      expect(isRetryable(new Error('bad input'))).toBe(false);
      expect(isRetryable(new TypeError('boom'), { retryableErrors: ['TypeError'] })).toBe(true);
    });
  });
});
