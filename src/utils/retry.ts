/**
 * Bounded retry with exponential backoff
 *
 * Used for the idempotent collaborator calls (playlist fetch, store write).
 * The model call and response parsing are never retried.
 *
 * @module utils/retry
 */

import { AbortedError } from './timeout.js';

/**
 * Retry configuration
 */
export interface RetryOptions {
  /** Maximum retry attempts after the first try (default: 2) */
  maxRetries?: number;
  /** Base delay in milliseconds for exponential backoff (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds for exponential backoff (default: 8000) */
  maxDelayMs?: number;
  /** Decide whether an error is worth another attempt (default: isRetryableError) */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each backoff sleep */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

const DEFAULT_RETRY = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8000,
} as const;

/**
 * Sleep helper for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay with jitter
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay in milliseconds
 * @returns Delay in milliseconds with jitter
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = Math.random() * 0.3 * exponential;
  return exponential + jitter;
}

/**
 * Determine if an error is retryable
 *
 * Errors that expose an `isRetryable` flag decide for themselves. Otherwise
 * rate limits, timeouts, network errors and 5xx responses count as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AbortedError) {
    return false;
  }
  if (typeof error === 'object' && error !== null && 'isRetryable' in error) {
    return error.isRetryable === true;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('429') ||
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }
  return false;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Async function to execute; receives the 0-indexed attempt
 * @param options - Retry configuration
 * @returns Result of the function
 * @throws Last error if all retries exhausted or the error is not retryable
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_RETRY.maxRetries;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries || options.signal?.aborted || !shouldRetry(error)) {
        break;
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}
