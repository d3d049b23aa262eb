/**
 * Modelsync AI Gateway - Errors
 */

import { HTTPError, TimeoutError } from 'ky';

/**
 * The server answered, but with something we cannot use
 */
export class ServerResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerResponseError';
  }
}

/**
 * Missing key, unknown provider or malformed judge reference
 */
export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConfigError';
  }
}

export function httpStatus(error: unknown): number | undefined {
  return error instanceof HTTPError ? error.response.status : undefined;
}

export function isNotFound(error: unknown): boolean {
  return httpStatus(error) === 404;
}

export function isTimeout(error: unknown): boolean {
  return error instanceof TimeoutError;
}

/**
 * Connection failures, request timeouts, 429 and 5xx are worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof HTTPError) {
    const status = error.response.status;
    return status === 408 || status === 429 || status >= 500;
  }
  // fetch rejects with a TypeError when the connection fails
  return error instanceof TypeError;
}
