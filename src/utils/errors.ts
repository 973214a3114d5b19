import { captureException } from '@sentry/node';

import { logger } from '../logger';

/**
 * Custom error class that describes client configuration errors
 */
export class ConfigurationError extends Error {
  public constructor(message?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Shape of errors thrown by Octokit for non-2xx responses
 */
export interface HttpError extends Error {
  status: number;
  response?: {
    headers: Record<string, string | number | undefined>;
    data?: unknown;
  };
}

/**
 * Checks whether the given value is an error carrying an HTTP status code
 *
 * @param e Any caught value
 */
export function isHttpError(e: unknown): e is HttpError {
  return e instanceof Error && 'status' in e && typeof e.status === 'number';
}

/**
 * Returns true if the given error is an HTTP error with the given status
 */
export function hasStatus(e: unknown, status: number): boolean {
  return isHttpError(e) && e.status === status;
}

/**
 * Processes an uncaught exception on the global level
 *
 * Sends the error to Sentry if Sentry SDK is configured.
 * It is expected that the program is terminated soon after
 * this function is called.
 *
 * @param e Error (exception) object to handle
 */
export function handleGlobalError(e: unknown): void {
  if (!(e instanceof ConfigurationError)) {
    captureException(e);
  }
  logger.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}
