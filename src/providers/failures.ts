/**
 * Upstream failure classification
 */

import { ProviderError, type ProviderErrorCategory, getErrorCodeSafe, getErrorMessage } from '../core/errors.js';
import { RETRYABLE_ERROR_CODES } from '../core/retry.js';

const MALFORMED_STATUSES = [400, 404, 413, 422];
const TIMEOUT_STATUSES = [408, 504];
const TIMEOUT_ERROR_NAMES = ['AbortError', 'TimeoutError', 'APIUserAbortError', 'APIConnectionTimeoutError'];

/**
 * Map an upstream HTTP status to a failure category
 */
export function categoryForStatus(status: number): ProviderErrorCategory {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'quota';
  if (MALFORMED_STATUSES.includes(status)) return 'malformed_request';
  if (TIMEOUT_STATUSES.includes(status)) return 'timeout';
  if (status >= 500) return 'upstream';
  return 'malformed_request';
}

export function providerErrorFromStatus(provider: string, status: number, detail: string): ProviderError {
  const suffix = detail ? `: ${detail.slice(0, 500)}` : '';
  return new ProviderError(`${provider} API HTTP error ${status}${suffix}`, provider, categoryForStatus(status), {
    status,
  });
}

function readStatus(error: object): number | undefined {
  // SDKs disagree on the property name
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('status_code' in error && typeof error.status_code === 'number') return error.status_code;
  return undefined;
}

function isConnectionFailure(error: Error): boolean {
  const code = getErrorCodeSafe(error) ?? getErrorCodeSafe(error.cause);
  if (code !== undefined && RETRYABLE_ERROR_CODES.includes(code)) return true;
  if (error.name === 'APIConnectionError') return true;
  return error instanceof TypeError && error.message === 'fetch failed';
}

/**
 * Classify an exception thrown while calling an upstream API.
 * Returns null when the error is not recognisably an upstream failure.
 */
export function asProviderError(provider: string, error: unknown): ProviderError | null {
  if (error instanceof ProviderError) return error;
  if (!(error instanceof Error)) return null;

  const cause = { cause: error };
  const status = readStatus(error);
  if (status !== undefined) {
    return new ProviderError(
      `${provider} API HTTP error ${status}: ${error.message}`,
      provider,
      categoryForStatus(status),
      { ...cause, status }
    );
  }
  if (TIMEOUT_ERROR_NAMES.includes(error.name)) {
    return new ProviderError(`${provider} request aborted: ${error.message}`, provider, 'timeout', cause);
  }
  if (isConnectionFailure(error)) {
    return new ProviderError(`${provider} unreachable: ${getErrorMessage(error)}`, provider, 'network', cause);
  }
  return null;
}
