/**
 * Model Relay - Error Hierarchy
 * Error classes shared by the orchestrator, executor, providers and HTTP layer
 */

/**
 * Error options for RelayError
 */
export interface RelayErrorOptions {
  code?: string;
  statusCode?: number;
  retryable?: boolean;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class for all relay errors
 */
export class RelayError extends Error {
  code: string;
  statusCode: number;
  retryable: boolean;
  context: Record<string, unknown>;

  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message);
    this.name = 'RelayError';
    this.code = options.code ?? 'RELAY_ERROR';
    this.statusCode = options.statusCode ?? 500;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};

    if (options.cause) {
      this.cause = options.cause;
    }

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Orchestration errors (surfaced to the caller, never retried)
// ============================================================================

/**
 * Unknown provider/model or malformed parameters
 */
export class ValidationError extends RelayError {
  field?: string;

  constructor(message: string, field?: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      ...options,
      retryable: false
    });
    this.name = 'ValidationError';
    this.field = field;
    if (field) {
      this.context.field = field;
    }
  }
}

/**
 * Missing or invalid credential
 */
export class AuthError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'AUTH_ERROR',
      statusCode: 401,
      ...options,
      retryable: false
    });
    this.name = 'AuthError';
  }
}

/**
 * Valid credential without the required rights
 */
export class PermissionError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'PERMISSION_DENIED',
      statusCode: 403,
      ...options,
      retryable: false
    });
    this.name = 'PermissionError';
  }
}

export class NotFoundError extends RelayError {
  constructor(resource: string, options: RelayErrorOptions = {}) {
    super(`${resource} not found`, {
      code: 'NOT_FOUND',
      statusCode: 404,
      ...options,
      retryable: false
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Illegal state transition (e.g. cancelling a terminal task)
 */
export class InvalidStateError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'INVALID_STATE',
      statusCode: 409,
      ...options,
      retryable: false
    });
    this.name = 'InvalidStateError';
  }
}

export class InternalError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'INTERNAL_ERROR',
      statusCode: 500,
      ...options
    });
    this.name = 'InternalError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends RelayError {
  constructor(message: string, options: RelayErrorOptions = {}) {
    super(message, {
      code: 'CONFIG_ERROR',
      ...options,
      retryable: false
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Execution errors (recorded on the task)
// ============================================================================

/**
 * Upstream failure categories
 */
export type ProviderErrorCategory =
  | 'authentication'
  | 'quota'
  | 'malformed_request'
  | 'timeout'
  | 'network'
  | 'upstream';

export const TRANSIENT_CATEGORIES: readonly ProviderErrorCategory[] = ['timeout', 'network', 'upstream'];

/**
 * Provider-related errors
 */
export class ProviderError extends RelayError {
  provider: string;
  category: ProviderErrorCategory;
  status?: number;

  constructor(
    message: string,
    provider: string,
    category: ProviderErrorCategory,
    options: RelayErrorOptions & { status?: number } = {}
  ) {
    super(message, {
      code: `PROVIDER_${category.toUpperCase()}`,
      statusCode: 502,
      ...options,
      retryable: TRANSIENT_CATEGORIES.includes(category)
    });
    this.name = 'ProviderError';
    this.provider = provider;
    this.category = category;
    this.status = options.status;
    this.context.provider = provider;
    this.context.category = category;
    if (options.status !== undefined) {
      this.context.status = options.status;
    }
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends RelayError {
  timeoutMs: number;

  constructor(message: string, timeoutMs: number, options: RelayErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'TIMEOUT_ERROR',
      statusCode: 504,
      retryable: options.retryable ?? true,
      ...options
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.context.timeoutMs = timeoutMs;
  }
}

/**
 * Pool exhausted error
 */
export class PoolExhaustedError extends RelayError {
  queueSize?: number;

  constructor(message: string, queueSize?: number, options: RelayErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'POOL_EXHAUSTED',
      statusCode: 503,
      retryable: true,
      ...options
    });
    this.name = 'PoolExhaustedError';
    this.queueSize = queueSize;
    if (queueSize !== undefined) {
      this.context.queueSize = queueSize;
    }
  }
}

/**
 * No invocation slot freed up in time; the provider was never called
 */
export class PoolTimeoutError extends RelayError {
  waitedMs: number;

  constructor(message: string, waitedMs: number, options: RelayErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'POOL_TIMEOUT',
      statusCode: 503,
      retryable: false,
      ...options
    });
    this.name = 'PoolTimeoutError';
    this.waitedMs = waitedMs;
    this.context.waitedMs = waitedMs;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Read a Node.js system error code (ENOENT, ECONNRESET, ...) without casting
 */
export function getErrorCodeSafe(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
