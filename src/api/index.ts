/**
 * Model Relay API Module
 * Re-exports server functionality and all modules
 */

// Server
export { createServer, startServer, collectRoutes } from './server.js';

// Config
export { API_CONFIG, loadApiConfig } from './config/index.js';
export type { ApiConfig, ServerConfig, MonitoringConfig } from './config/index.js';

// Constants
export { VALIDATION_ERRORS, API_ERRORS, SUCCESS_MESSAGES, LOG_MESSAGES } from './constants/messages.js';

// Types
export * from './types/index.js';

// Validators
export * from './validators/index.js';

// Middleware
export * from './middleware/index.js';

// Utils
export * from './utils/index.js';

// Routes
export * from './routes/index.js';
