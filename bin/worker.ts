#!/usr/bin/env node
/**
 * Model Relay Worker Entry Point
 * Runs executor workers and the stale-task reaper without the HTTP API
 */

import 'dotenv/config';
import { loadConfig, requireSharedBackends } from '../src/config/config.js';
import { createApp } from '../src/app.js';
import { GracefulShutdownManager } from '../src/services/GracefulShutdown.js';
import { logger } from '../src/services/Logger.js';
import { getErrorMessage } from '../src/core/errors.js';

async function main(): Promise<void> {
  const config = loadConfig();
  requireSharedBackends(config, 'A standalone worker');
  const app = await createApp(config);
  const shutdown = new GracefulShutdownManager();

  logger.banner('Model Relay Worker', [
    `Queue: ${config.queueBrokerUrl}`,
    `Store: ${config.dataStoreUrl}`,
    `Concurrency: ${config.executor.concurrency}`,
    `Providers: ${app.providers.getProviderNames().join(', ')}`,
  ]);

  app.executor.start();

  shutdown.register('app', () => app.close());
  shutdown.installSignalHandlers();
}

main().catch((error: unknown) => {
  logger.error(`Failed to start worker: ${getErrorMessage(error)}`);
  process.exit(1);
});
