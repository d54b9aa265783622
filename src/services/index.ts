/**
 * Model Relay - Services Index
 */

export { Logger, logger } from './Logger.js';
export type { LoggerOptions } from './Logger.js';
export { GracefulShutdownManager } from './GracefulShutdown.js';
export type { ShutdownHandler, ShutdownOptions } from './GracefulShutdown.js';
