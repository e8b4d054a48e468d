/**
 * Retry Utility Unit Tests
 *
 * Retry counts, delay progression, predicates and cancellation.
 * Uses real timers with 1-10ms delays.
 */

import { describe, it, expect, vi, beforeEach, type MockedFunction } from 'vitest';
import {
  retryWithBackoff,
  retryWithLinearBackoff,
  RetryPredicates,
  isAbortError,
  sleep,
} from '@/shared/utils/retry';

// ============================================================================
// MOCKS SETUP
// ============================================================================

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@/shared/utils/logger', () => ({
  logger: mockLogger,
  createChildLogger: () => mockLogger,
}));

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

// ============================================================================
// TEST SUITE
// ============================================================================

describe('Retry Utility', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('Linear Backoff', () => {
    it('returns after k failures with exactly k+1 calls', async () => {
      const mockFn: MockedFunction<() => Promise<string>> = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('503'))
        .mockRejectedValueOnce(new Error('503'))
        .mockResolvedValueOnce('ok');
      const onRetry = vi.fn<(attempt: number, error: Error, delay: number) => void>();

      const result = await retryWithLinearBackoff(mockFn, { maxRetries: 2, baseDelay: 5, onRetry });

      expect(result).toBe('ok');
      expect(mockFn).toHaveBeenCalledTimes(3);
      expect(onRetry.mock.calls.map((call) => call[2])).toEqual([5, 10]);
    });

    it('raises the last error after maxRetries + 1 calls', async () => {
      let calls = 0;
      const mockFn = vi.fn(async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      });

      await expect(retryWithLinearBackoff(mockFn, { maxRetries: 2, baseDelay: 1 })).rejects.toThrow('failure 3');
      expect(mockFn).toHaveBeenCalledTimes(3);
    });

    it('logs each retry through the default hook', async () => {
      const mockFn = vi.fn<() => Promise<number>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(1);

      await retryWithLinearBackoff(mockFn, { maxRetries: 1, baseDelay: 1 });

      expect(mockLogger.warn).toHaveBeenCalledWith(
        { attempt: 1, error: 'flaky', nextDelayMs: 1 },
        'Retrying operation'
      );
    });
  });

  describe('Exponential Backoff', () => {
    it('doubles the delay without jitter', async () => {
      const mockFn = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('a'))
        .mockRejectedValueOnce(new Error('b'))
        .mockResolvedValueOnce('done');
      const onRetry = vi.fn<(attempt: number, error: Error, delay: number) => void>();

      await retryWithBackoff(mockFn, { maxRetries: 3, baseDelay: 2, factor: 2, jitter: 0, onRetry });

      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error), 2);
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Error), 4);
    });

    it('stops on non-retryable errors', async () => {
      const mockFn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('Login failed'));

      await expect(
        retryWithBackoff(mockFn, { maxRetries: 3, baseDelay: 1, isRetryable: RetryPredicates.isDatabaseError })
      ).rejects.toThrow('Login failed');
      expect(mockFn).toHaveBeenCalledTimes(1);
    });
  });

  describe('Cancellation', () => {
    it('never retries an AbortError', async () => {
      const mockFn = vi.fn<() => Promise<string>>().mockRejectedValue(abortError());

      await expect(retryWithLinearBackoff(mockFn, { maxRetries: 5, baseDelay: 1 })).rejects.toMatchObject({
        name: 'AbortError',
      });
      expect(mockFn).toHaveBeenCalledTimes(1);
    });

    it('does not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const mockFn = vi.fn<() => Promise<string>>().mockResolvedValue('never');

      await expect(retryWithLinearBackoff(mockFn, { signal: controller.signal })).rejects.toMatchObject({
        name: 'AbortError',
      });
      expect(mockFn).not.toHaveBeenCalled();
    });

    it('interrupts the wait between attempts', async () => {
      const controller = new AbortController();
      const mockFn = vi.fn<() => Promise<string>>().mockImplementation(async () => {
        setTimeout(() => controller.abort(), 5);
        throw new Error('transient');
      });

      await expect(
        retryWithLinearBackoff(mockFn, { maxRetries: 3, baseDelay: 10_000, signal: controller.signal })
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(mockFn).toHaveBeenCalledTimes(1);
    });
  });

  describe('helpers', () => {
    it('classifies abort errors', () => {
      expect(isAbortError(abortError())).toBe(true);
      expect(isAbortError(new Error('Aborted'))).toBe(true);
      expect(isAbortError(new Error('boom'))).toBe(false);
      expect(isAbortError('AbortError')).toBe(false);
    });

    it('sleep resolves after the delay', async () => {
      const started = Date.now();
      await sleep(5);
      expect(Date.now() - started).toBeGreaterThanOrEqual(4);
    });
  });
});
