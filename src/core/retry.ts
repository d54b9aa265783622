/**
 * Model Relay - Retry Logic & Timeouts
 * Standardized retry mechanism with exponential backoff
 */

import type { RetryConfig } from '../types/provider.js';
import { RelayError, TimeoutError, getErrorCodeSafe } from './errors.js';

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitter: true
};

/**
 * Retryable error codes
 */
export const RETRYABLE_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
];

/**
 * Retry attempt info
 */
export interface RetryAttemptInfo {
  attempt: number;
  maxRetries: number;
  error: Error;
  delay: number;
}

/**
 * Extended retry options
 */
export interface RetryOptions extends RetryConfig {
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Determines if an error is retryable: relay errors carry their own
 * flag, anything else is judged by its system error code.
 */
export function isRetryableError(error: unknown, options: Pick<RetryOptions, 'shouldRetry'> = {}): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (options.shouldRetry) {
    return options.shouldRetry(error);
  }

  if (error instanceof RelayError) {
    return error.retryable;
  }

  const code = getErrorCodeSafe(error) ?? getErrorCodeSafe(error.cause);
  return code !== undefined && RETRYABLE_ERROR_CODES.includes(code);
}

/**
 * Calculate delay with exponential backoff and optional jitter
 */
export function calculateDelay(attempt: number, options: RetryConfig = {}): number {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options };
  const { baseDelay, maxDelay, backoffMultiplier, jitter } = config;

  // Calculate exponential delay
  let delay = baseDelay * Math.pow(backoffMultiplier, attempt);

  // Apply jitter (random factor between 0.5 and 1.5)
  if (jitter) {
    const jitterFactor = 0.5 + Math.random();
    delay *= jitterFactor;
  }

  // Cap at max delay
  return Math.min(delay, maxDelay);
}

/**
 * Sleep for specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic. `fn` receives the zero-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options };
  const { maxRetries, onRetry } = config;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxRetries || !isRetryableError(lastError, options)) {
        throw lastError;
      }

      const delay = calculateDelay(attempt, config);

      if (onRetry) {
        onRetry({
          attempt: attempt + 1,
          maxRetries,
          error: lastError,
          delay
        });
      }

      await sleep(delay);
    }
  }

  throw lastError ?? new Error('Retry failed');
}

/**
 * Execute with timeout. The controller, when given, is aborted on expiry
 * so the underlying request can stop; its result is discarded either way.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out',
  controller?: AbortController
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller?.abort();
      reject(new TimeoutError(message, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
