/**
 * Response Messages
 * Centralized messages for consistent API responses
 */

// ═══════════════════════════════════════════════════════════════════════════
// Validation Errors
// ═══════════════════════════════════════════════════════════════════════════

export const VALIDATION_ERRORS = {
  REQUIRED: (field: string) => `${field} is required`,
  INVALID_TYPE: (field: string, expected: string) => `${field} must be a ${expected}`,
  INVALID_ENUM: (field: string, values: readonly string[]) =>
    `${field} must be one of: ${values.join(', ')}`,
  OUT_OF_RANGE: (field: string, min: number, max: number) =>
    `${field} must be between ${min} and ${max}`,
  EMPTY_STRING: (field: string) => `${field} cannot be empty`,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// API Errors
// ═══════════════════════════════════════════════════════════════════════════

export const API_ERRORS = {
  ROUTE_NOT_FOUND: (method: string, url: string) => `Route ${method} ${url} not found`,
  CREDENTIAL_REQUIRED: 'A bearer token or API key is required',
  PERMISSION_DENIED: (resource: string, action: string) => `Not allowed to ${action} ${resource}`,
  INTERNAL_ERROR: 'Internal server error',
  BAD_REQUEST: 'Bad request',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Success Messages
// ═══════════════════════════════════════════════════════════════════════════

export const SUCCESS_MESSAGES = {
  HEALTHY: 'Service is healthy',
  DEGRADED: 'Service is degraded',
  PROVIDERS_LISTED: 'Providers retrieved',
  TASK_QUEUED: 'Task accepted for processing',
  TASK_COMPLETED: 'Task completed',
  TASK_FAILED: 'Task failed',
  TASK_CANCELLED: 'Task cancelled',
  TASK_STATUS: 'Task status retrieved',
  TASK_RESULT_READY: 'Task result retrieved',
  TASK_RESULT_PENDING: 'Task is still running',
  TASKS_LISTED: 'Tasks retrieved',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Log Messages
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_MESSAGES = {
  SLOW_REQUEST: 'Slow request detected',
  SERVER_STARTED: (host: string, port: number) => `Server listening at http://${host}:${port}`,
  SERVER_STOPPED: 'Server stopped',
} as const;
