/**
 * Routes Module
 */

export { healthRoutes } from './health.js';
export { providerRoutes } from './providers.js';
export { taskRoutes } from './tasks.js';
