import { TIMEOUT_ERROR_NAMES, TRANSIENT_ERROR_CODES } from '@/utils/constants';
import { RequestError } from '@octokit/request-error';

/**
 * Classification of a failed GitHub API call.
 */
export type ReleaseNotesErrorKind = 'not-found' | 'rate-limited' | 'transient' | 'permission' | 'unexpected';

/**
 * Error raised when a step of the release note generation fails. The originating error is kept as
 * `cause`.
 */
export class ReleaseNotesError extends Error {
  constructor(
    message: string,
    public readonly kind: ReleaseNotesErrorKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ReleaseNotesError';
  }
}

function readHeader(error: RequestError, name: string): string | undefined {
  const value = error.response?.headers[name];
  return value === undefined ? undefined : String(value);
}

/**
 * Returns the epoch milliseconds at which a rate limited request may be retried, or `null` if the
 * error is not a rate limit.
 *
 * GitHub signals an exhausted primary rate limit with `x-ratelimit-remaining: 0` and the reset time in
 * `x-ratelimit-reset` (epoch seconds). Secondary rate limits send `retry-after` in seconds instead.
 *
 * @param {unknown} error - The failure to inspect
 * @param {number} now - Current time in epoch milliseconds
 * @returns {number | null} The reset time, or `null`
 */
export function getRateLimitReset(error: unknown, now: number): number | null {
  if (!(error instanceof RequestError) || (error.status !== 403 && error.status !== 429)) {
    return null;
  }

  if (readHeader(error, 'x-ratelimit-remaining') === '0') {
    const reset = Number(readHeader(error, 'x-ratelimit-reset'));
    // Exhausted limit without a usable reset time: still a rate limit, retried with the generic delay.
    return Number.isFinite(reset) ? reset * 1000 : now;
  }

  const retryAfter = readHeader(error, 'retry-after');
  if (retryAfter !== undefined && Number.isFinite(Number(retryAfter))) {
    return now + Number(retryAfter) * 1000;
  }

  return null;
}

export function isRateLimitError(error: unknown): boolean {
  return getRateLimitReset(error, Date.now()) !== null;
}

function hasTransientCode(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.includes(error.code)) {
    return true;
  }

  if (TIMEOUT_ERROR_NAMES.includes(error.name) || error.message.toLowerCase().includes('fetch failed')) {
    return true;
  }

  return hasTransientCode(error.cause);
}

/**
 * Whether a failure is worth retrying as-is: server errors, network failures and timeouts.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RequestError && error.status >= 500) {
    return true;
  }

  return hasTransientCode(error);
}

/**
 * Determines the kind of a failure.
 */
export function classifyError(error: unknown): ReleaseNotesErrorKind {
  if (error instanceof ReleaseNotesError) {
    return error.kind;
  }
  if (isRateLimitError(error)) {
    return 'rate-limited';
  }
  if (isTransientError(error)) {
    return 'transient';
  }
  if (error instanceof RequestError) {
    if (error.status === 404) {
      return 'not-found';
    }
    if (error.status === 401 || error.status === 403) {
      return 'permission';
    }
  }

  return 'unexpected';
}

/**
 * Wraps any failure of an operation in a {@link ReleaseNotesError}.
 *
 * @param {string} operation - What was being attempted, e.g. "fetch latest release"
 * @param {unknown} error - The failure
 * @returns {ReleaseNotesError} Error with message `Failed to <operation>: <message> (status: <n>)`
 */
export function toReleaseNotesError(operation: string, error: unknown): ReleaseNotesError {
  let errorMessage: string;
  if (error instanceof RequestError) {
    errorMessage = `Failed to ${operation}: ${error.message.trim()} (status: ${error.status})`;
  } else if (error instanceof Error) {
    errorMessage = `Failed to ${operation}: ${error.message.trim()}`;
  } else {
    errorMessage = `Failed to ${operation}: ${String(error).trim()}`;
  }

  return new ReleaseNotesError(errorMessage, classifyError(error), { cause: error });
}
