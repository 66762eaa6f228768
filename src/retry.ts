import { getRateLimitReset, isTransientError } from '@/errors';
import { RETRY_DEFAULTS } from '@/utils/constants';
import { warning } from '@actions/core';

export interface RetryOptions {
  /**
   * Retries after the first attempt. Defaults to 3.
   */
  maxRetries?: number;
  baseDelayMs?: number;

  /**
   * Clock in epoch milliseconds.
   */
  now?: () => number;

  /**
   * Source of values in [0, 1) used for jitter.
   */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff for the given retry (1-based), scaled by a jitter factor in [0.8, 1.2).
 */
export function getBackoffDelay(retry: number, baseDelayMs: number, random: () => number): number {
  const jitter = RETRY_DEFAULTS.JITTER_MIN + (RETRY_DEFAULTS.JITTER_MAX - RETRY_DEFAULTS.JITTER_MIN) * random();
  return Math.round(baseDelayMs * 2 ** (retry - 1) * jitter);
}

/**
 * Computes how long to wait before the next attempt, or `null` if the error is not retryable.
 *
 * A rate limited request waits until one second past the reset time. If the reset time has already
 * passed, the generic backoff applies.
 */
export function getRetryDelay(
  error: unknown,
  retry: number,
  { baseDelayMs = RETRY_DEFAULTS.BASE_DELAY_MS, now = Date.now, random = Math.random }: RetryOptions = {},
): number | null {
  const currentTime = now();
  const resetAt = getRateLimitReset(error, currentTime);

  if (resetAt !== null) {
    const untilReset = resetAt - currentTime + RETRY_DEFAULTS.RATE_LIMIT_PADDING_MS;
    return untilReset > 0 ? untilReset : getBackoffDelay(retry, baseDelayMs, random);
  }

  if (isTransientError(error)) {
    return getBackoffDelay(retry, baseDelayMs, random);
  }

  return null;
}

/**
 * Runs an operation, retrying rate limited and transient failures.
 *
 * Any other failure is thrown immediately. Once the retries are used up the last error is thrown
 * unchanged.
 *
 * @param {() => Promise<T>} operation - The remote call to run
 * @param {string} description - Short name of the call used in log messages
 * @param {RetryOptions} options - Retry policy overrides
 * @returns {Promise<T>} The operation's result
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  description: string,
  options: RetryOptions = {},
): Promise<T> {
  const { maxRetries = RETRY_DEFAULTS.MAX_RETRIES, sleep = defaultSleep } = options;

  for (let retry = 0; ; retry++) {
    try {
      return await operation();
    } catch (error) {
      if (retry >= maxRetries) {
        throw error;
      }

      const delay = getRetryDelay(error, retry + 1, options);
      if (delay === null) {
        throw error;
      }

      const message = error instanceof Error ? error.message.trim() : String(error);
      warning(
        `GitHub API call "${description}" failed (attempt ${retry + 1}/${maxRetries}), retrying in ${delay}ms: ${message}`,
      );

      await sleep(delay);
    }
  }
}
