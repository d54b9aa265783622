/**
 * Middleware Module
 * Re-exports all middleware
 */

export { errorHandler, notFoundHandler } from './errorHandler.js';

export { createRequestTiming, generateRequestId } from './requestLogger.js';
export type { RequestTimingHooks } from './requestLogger.js';

export { createPermissionGate } from './permissionGate.js';
export type { PermissionGateOptions } from './permissionGate.js';
