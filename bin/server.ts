#!/usr/bin/env node
/**
 * Model Relay API Server Entry Point
 * Serves the HTTP API; also runs executor workers unless EXECUTOR_ENABLED=false
 */

import 'dotenv/config';
import { loadConfig } from '../src/config/config.js';
import { createApp } from '../src/app.js';
import { startServer, loadApiConfig } from '../src/api/index.js';
import { GracefulShutdownManager } from '../src/services/GracefulShutdown.js';
import { logger } from '../src/services/Logger.js';
import { getErrorMessage } from '../src/core/errors.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const app = await createApp(config);
  const shutdown = new GracefulShutdownManager();

  const fastify = await startServer(app.serverDeps(), { config: loadApiConfig() });

  if (config.executor.enabled) {
    app.executor.start();
  }

  shutdown.register('http', () => fastify.close());
  shutdown.register('app', () => app.close());
  shutdown.installSignalHandlers();
}

main().catch((error: unknown) => {
  logger.error(`Failed to start server: ${getErrorMessage(error)}`);
  process.exit(1);
});
