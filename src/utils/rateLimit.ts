import { logger } from '../logger';

import { sleep } from './async';
import { ConfigurationError, isHttpError } from './errors';

/** Wait used when a rate limit response carries no reset information */
export const DEFAULT_RATE_LIMIT_WAIT_SECS = 60;

const RATE_LIMIT_STATUSES = new Set([403, 429]);

/**
 * Returns the value of a response header, if the error carries one
 */
function getHeader(error: unknown, name: string): string | undefined {
  if (!isHttpError(error) || !error.response) {
    return undefined;
  }
  const value = error.response.headers[name];
  return value === undefined ? undefined : String(value);
}

/**
 * Checks if the error is GitHub telling us the rate limit was exceeded
 *
 * GitHub answers with 403 (primary limit) or 429 (secondary limit) and
 * mentions the rate limit in the message, or reports no requests left.
 */
export function isRateLimitError(error: unknown): boolean {
  if (!isHttpError(error) || !RATE_LIMIT_STATUSES.has(error.status)) {
    return false;
  }
  if (/rate limit/i.test(error.message)) {
    return true;
  }
  const data = error.response?.data;
  if (data && /rate limit/i.test(JSON.stringify(data))) {
    return true;
  }
  return getHeader(error, 'x-ratelimit-remaining') === '0';
}

/**
 * Computes how long to wait before retrying after a rate limit error
 *
 * An exhausted primary quota waits for `x-ratelimit-reset`. Otherwise
 * `retry-after` wins: secondary limits send it along with the reset time
 * of the primary window, which may be up to an hour away.
 *
 * @param error The rate limit error
 * @param now Current time in milliseconds
 * @returns Milliseconds to wait, never negative
 */
export function getRateLimitWaitMs(error: unknown, now: number): number {
  const reset = Number(getHeader(error, 'x-ratelimit-reset') ?? NaN);
  const retryAfter = Number(getHeader(error, 'retry-after') ?? NaN);
  const resetWaitMs = Math.max(0, reset - Math.floor(now / 1000)) * 1000;

  if (!isNaN(reset) && getHeader(error, 'x-ratelimit-remaining') === '0') {
    return resetWaitMs;
  }
  if (!isNaN(retryAfter)) {
    return Math.max(0, retryAfter) * 1000;
  }
  if (!isNaN(reset)) {
    return resetWaitMs;
  }
  return DEFAULT_RATE_LIMIT_WAIT_SECS * 1000;
}

/**
 * Validates a rate limit retry budget
 *
 * @param value Budget from the command line or options, unlimited if undefined
 * @throws ConfigurationError unless the value is a non-negative integer
 */
export function parseRateLimitRetries(value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const retries = typeof value === 'string' && value.trim() ? Number(value) : value;
  if (
    typeof retries !== 'number' ||
    !(Number.isInteger(retries) || retries === Infinity) ||
    retries < 0
  ) {
    throw new ConfigurationError(
      `Invalid rate limit retry budget "${String(value)}": ` +
        'expected a non-negative integer.'
    );
  }
  return retries;
}

/**
 * Error thrown once the rate limit retry budget is spent
 */
export class RateLimitExceededError extends Error {
  public constructor(public readonly retries: number, cause: unknown) {
    super(`GitHub rate limit still exceeded after ${retries} retries`, {
      cause,
    });
    this.name = 'RateLimitExceededError';
  }
}

/** Options for {@link withRateLimitRetry} */
export interface RateLimitRetryOptions {
  /** Maximum number of retries, unlimited by default */
  maxRetries?: number;
}

/**
 * Calls `fn`, waiting out GitHub rate limits and calling it again
 *
 * Any other error is passed through.
 */
export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  options: RateLimitRetryOptions = {}
): Promise<T> {
  const maxRetries = parseRateLimitRetries(options.maxRetries) ?? Infinity;
  for (let retries = 0; ; retries += 1) {
    try {
      return await fn();
    } catch (e) {
      if (!isRateLimitError(e)) {
        throw e;
      }
      if (retries >= maxRetries) {
        throw new RateLimitExceededError(retries, e);
      }
      const waitMs = getRateLimitWaitMs(e, Date.now());
      logger.warn(
        `Rate limit exceeded. Waiting for ${Math.ceil(waitMs / 1000)} seconds...`
      );
      await sleep(waitMs);
    }
  }
}
