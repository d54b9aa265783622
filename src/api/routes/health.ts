/**
 * Health Check Routes
 */

import { getErrorMessage } from '../../core/errors.js';
import type { ServerDeps, HealthResults, RouteDefinition } from '../types/index.js';
import { SUCCESS_MESSAGES } from '../constants/messages.js';
import { ok } from '../utils/envelope.js';

async function attempt<T>(check: () => Promise<T>, onError: (message: string) => void): Promise<T | null> {
  try {
    return await check();
  } catch (error) {
    onError(getErrorMessage(error));
    return null;
  }
}

export function healthRoutes(deps: Pick<ServerDeps, 'store' | 'queue' | 'executor' | 'runner'>, version: string): RouteDefinition[] {
  return [
    {
      /**
       * GET /health
       * Liveness plus store and queue connectivity
       */
      method: 'GET',
      url: '/health',
      handler: async (request, reply) => {
        const logFailure = (message: string) => request.log.warn({ msg: 'Health check failed', error: message });

        const storeUp = (await attempt(() => deps.store.ping(), logFailure)) === true;
        const queueUp = (await attempt(() => deps.queue.ping(), logFailure)) === true;
        const queueSize = queueUp ? await attempt(() => deps.queue.size(), logFailure) : null;

        const healthy = storeUp && queueUp;
        const results: HealthResults = {
          status: healthy ? 'ok' : 'degraded',
          version,
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
          store: storeUp ? 'ok' : 'unreachable',
          queue: { reachable: queueUp, size: queueSize },
          executor: { running: deps.executor?.isRunning() ?? false },
          invocations: deps.runner?.getPoolStatus() ?? null,
        };

        reply.status(healthy ? 200 : 503);
        return ok(healthy ? SUCCESS_MESSAGES.HEALTHY : SUCCESS_MESSAGES.DEGRADED, results);
      },
    },
  ];
}
