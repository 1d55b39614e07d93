/**
 * Error Recovery Strategies
 * @module errors/recovery
 *
 * Retry with exponential backoff for transient failures.
 */

import { isBaseError, toError } from './base.js';
import { isRetryableError } from './codes.js';

// ============================================================================
// Retry Strategy
// ============================================================================

/**
 * Retry configuration options
 */
export interface RetryOptions {
  /** Maximum number of attempts, the first one included */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  delayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs: number;
  /** Custom function to determine if error is retryable */
  retryIf?: (error: Error, attempt: number) => boolean;
  /** Callback invoked before each retry */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  delayMs: 100,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
};

/**
 * Execute an operation with retry logic
 *
 * @example
 * ```typescript
 * await withRetry(() => redis.publish(channel, body), { maxAttempts: 3 });
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const { maxAttempts, delayMs, backoffMultiplier, maxDelayMs, retryIf, onRetry } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const shouldRetry = retryIf ?? defaultRetryIf;

  let currentDelay = delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (caught) {
      const error = toError(caught);
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }

      const actualDelay = Math.min(currentDelay, maxDelayMs);
      onRetry?.(error, attempt, actualDelay);
      await sleep(actualDelay);
      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs);
    }
  }
}

/**
 * BaseErrors retry by code; anything else (network, driver) is assumed transient
 */
function defaultRetryIf(error: Error): boolean {
  return isBaseError(error) ? isRetryableError(error.code) : true;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
