/**
 * Retry Policy
 *
 * Exponential backoff with jitter for transient failures of outbound calls.
 */

import { CancelledError, throwIfAborted } from '../../domain/generation/errors.js';

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterFactor: 0.2,
};

export interface RetryOptions {
  config?: Partial<RetryConfig>;
  /** Decides whether a failed attempt is worth repeating */
  shouldRetry: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  random?: () => number;
}

/**
 * Get retry delay with exponential backoff and jitter
 */
export function getRetryDelay(
  attemptCount: number,
  config: Partial<RetryConfig> = {},
  random: () => number = Math.random
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = { ...DEFAULT_RETRY_CONFIG, ...config };

  // Exponential backoff: baseDelay * 2^attempt
  const exponentialDelay = baseDelayMs * Math.pow(2, attemptCount);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * jitterFactor * random();

  return Math.floor(cappedDelay + jitter);
}

/**
 * Resolves after `ms`, or rejects with CancelledError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
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

/**
 * Runs `operation` until it succeeds, the error is not retryable, or the
 * retry budget is spent. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.config };

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof CancelledError || options.signal?.aborted) {
        throw error;
      }
      if (attempt >= config.maxRetries || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = getRetryDelay(attempt, config, options.random);
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
