/**
 * Model Relay - Application wiring
 * Builds the store, queue, provider registry, runner, orchestrator and executor
 * from a RelayConfig. Used by both the API server and the standalone worker.
 */

import type { RelayConfig } from './config/config.js';
import type { ServerDeps } from './api/types/index.js';
import { HttpAuthGatewayClient, type AuthGatewayClient } from './auth/index.js';
import { TaskExecutor } from './executor/index.js';
import { createProviderRegistry, type ProviderRegistry } from './providers/index.js';
import { createJobQueue, type JobQueue } from './queue/index.js';
import { createTaskStore, type TaskStore } from './store/index.js';
import { CancellationRegistry, TaskOrchestrator, TaskRunner } from './tasks/index.js';
import { logger } from './services/Logger.js';

export interface AppOverrides {
  store?: TaskStore;
  queue?: JobQueue;
  providers?: ProviderRegistry;
  authClient?: AuthGatewayClient;
}

export interface RelayApp {
  config: RelayConfig;
  store: TaskStore;
  queue: JobQueue;
  providers: ProviderRegistry;
  cancellations: CancellationRegistry;
  runner: TaskRunner;
  orchestrator: TaskOrchestrator;
  executor: TaskExecutor;
  authClient: AuthGatewayClient;
  /** Dependencies for createServer() */
  serverDeps(): ServerDeps;
  /** Stop the executor, then close the queue and the store */
  close(): Promise<void>;
}

export async function createApp(config: RelayConfig, overrides: AppOverrides = {}): Promise<RelayApp> {
  logger.configure({ level: config.logLevel });

  const store = overrides.store ?? (await createTaskStore(config.dataStoreUrl));
  const queue =
    overrides.queue ??
    (await createJobQueue(config.queueBrokerUrl, {
      pollIntervalMs: config.queue.pollIntervalMs,
      visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
    }));
  const providers = overrides.providers ?? createProviderRegistry(config.providers);
  const authClient =
    overrides.authClient ??
    new HttpAuthGatewayClient({ baseUrl: config.auth.serviceUrl, timeoutMs: config.auth.timeoutMs });

  const { executor: exec } = config;
  const cancellations = new CancellationRegistry();
  const runner = new TaskRunner(store, providers, cancellations, {
    timeoutMs: exec.providerTimeoutMs,
    concurrency: exec.concurrency,
    retry: {
      maxRetries: exec.maxRetries,
      baseDelay: exec.retryBaseDelayMs,
      maxDelay: exec.retryMaxDelayMs,
      jitter: true,
    },
  });

  const orchestrator = new TaskOrchestrator({ store, queue, providers, runner, cancellations });
  const executor = new TaskExecutor(
    { store, queue, runner },
    {
      concurrency: exec.concurrency,
      staleAfterMs: exec.staleAfterMs,
      reapIntervalMs: exec.reapIntervalMs,
    }
  );

  let closed = false;

  return {
    config,
    store,
    queue,
    providers,
    cancellations,
    runner,
    orchestrator,
    executor,
    authClient,
    serverDeps: () => ({
      orchestrator,
      providers,
      store,
      queue,
      authClient,
      auth: config.auth,
      executor,
      runner,
    }),
    close: async () => {
      if (closed) return;
      closed = true;
      await executor.stop();
      await queue.close();
      await store.close();
    },
  };
}
