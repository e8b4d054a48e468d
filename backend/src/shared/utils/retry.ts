/**
 * Retry Utility
 *
 * Backoff retry for unreliable operations: model calls, database connects.
 * Cancellation is never retried: an aborted signal or an `AbortError`
 * propagates on the spot, including while waiting between attempts.
 *
 * @module shared/utils/retry
 */

import { createChildLogger } from './logger';

const logger = createChildLogger({ service: 'Retry' });

/**
 * Retry Options
 */
export interface RetryOptions {
  /** Additional attempts after the first one (default: 3) */
  maxRetries?: number;

  /** Base delay in milliseconds (default: 1000) */
  baseDelay?: number;

  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelay?: number;

  /** Exponential factor (default: 2) */
  factor?: number;

  /** Jitter factor 0-1 applied to exponential delays (default: 0.1) */
  jitter?: number;

  /** Whether a failure should be retried (default: every non-cancellation error) */
  isRetryable?: (error: Error) => boolean;

  /** Called before each wait */
  onRetry?: (attempt: number, error: Error, nextDelay: number) => void;

  /** Cancels the operation and any pending wait */
  signal?: AbortSignal;
}

type ResolvedOptions = Required<Omit<RetryOptions, 'signal'>> & { signal?: AbortSignal };

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  factor: 2,
  jitter: 0.1,
  isRetryable: () => true,
  onRetry: (attempt, error, nextDelay) => {
    logger.warn({ attempt, error: error.message, nextDelayMs: nextDelay }, 'Retrying operation');
  },
};

/**
 * True for cancellation: DOM-style `AbortError`s and LangChain's "Aborted" errors.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'AbortError' || error.message === 'Aborted' || error.message === 'AbortError';
}

/**
 * Error raised when a signal aborts an operation that has no reason of its own.
 */
export function createAbortError(signal?: AbortSignal): Error {
  if (signal?.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError(signal);
  }
}

/**
 * Wait for `ms`, rejecting with an abort error as soon as `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function runWithRetry<T>(
  fn: () => Promise<T>,
  opts: ResolvedOptions,
  delayFor: (attempt: number) => number
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfAborted(opts.signal);

    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (isAbortError(lastError) || opts.signal?.aborted) {
        throw lastError;
      }

      if (attempt >= opts.maxRetries || !opts.isRetryable(lastError)) {
        throw lastError;
      }

      const delay = delayFor(attempt);
      opts.onRetry(attempt + 1, lastError, delay);
      await sleep(delay, opts.signal);
    }
  }
}

/**
 * Retry with Exponential Backoff
 *
 * Delay before retry n (1-based): `baseDelay * factor^(n-1)`, capped at
 * `maxDelay`, with ±jitter.
 *
 * @example
 * ```typescript
 * const pool = await retryWithBackoff(() => connect(config), {
 *   maxRetries: 5,
 *   baseDelay: 200,
 *   isRetryable: RetryPredicates.isDatabaseError,
 * });
 * ```
 */
export function retryWithBackoff<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };

  return runWithRetry(fn, opts, (attempt) => {
    const exponentialDelay = opts.baseDelay * Math.pow(opts.factor, attempt);
    const cappedDelay = Math.min(exponentialDelay, opts.maxDelay);
    const jitterAmount = cappedDelay * opts.jitter;
    const jitter = Math.random() * jitterAmount * 2 - jitterAmount;
    return Math.max(0, Math.round(cappedDelay + jitter));
  });
}

/**
 * Retry with Linear Backoff
 *
 * Delay before retry n (1-based): `baseDelay * n`, capped at `maxDelay`.
 * No jitter, so delays never decrease.
 */
export function retryWithLinearBackoff<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };

  return runWithRetry(fn, opts, (attempt) => Math.min(opts.baseDelay * (attempt + 1), opts.maxDelay));
}

/**
 * Common Retry Predicates
 */
export const RetryPredicates = {
  isDatabaseError: (error: Error): boolean => {
    const dbErrors = ['ECONNREFUSED', 'ETIMEDOUT', 'ESOCKET', 'connection timeout', 'deadlock', 'lock timeout'];
    return dbErrors.some((code) => error.message.toLowerCase().includes(code.toLowerCase()));
  },
};
