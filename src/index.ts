/**
 * Model Relay - Main Module Index
 */

// Configuration
export {
  loadConfig,
  requireSharedBackends,
  getEnvBoolean,
  getEnvList,
  getEnvNumber,
  getEnvString,
} from './config/config.js';
export type { AuthConfig, Env, ExecutorConfig, QueueConfig, RelayConfig } from './config/config.js';
export * from './config/constants.js';

// Types
export * from './types/index.js';

// Core
export * from './core/errors.js';
export { withRetry, withTimeout, calculateDelay, DEFAULT_RETRY_CONFIG } from './core/retry.js';
export { InvocationPool } from './core/pool.js';
export type { PoolOptions, PoolStatus } from './core/pool.js';

// Subsystems
export * from './store/index.js';
export * from './queue/index.js';
export * from './providers/index.js';
export * from './tasks/index.js';
export * from './executor/index.js';
export * from './auth/index.js';

// Services
export { Logger, logger } from './services/Logger.js';
export { GracefulShutdownManager } from './services/GracefulShutdown.js';

// Application
export { createApp } from './app.js';
export type { AppOverrides, RelayApp } from './app.js';
export { createServer, startServer } from './api/index.js';
