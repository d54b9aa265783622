/**
 * Model Relay HTTP API Server
 * Fastify server exposing task orchestration and provider discovery
 */

import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';

// Routes
import { healthRoutes, providerRoutes, taskRoutes } from './routes/index.js';

// Middleware
import {
  createPermissionGate,
  createRequestTiming,
  errorHandler,
  generateRequestId,
  notFoundHandler,
} from './middleware/index.js';

// Types
import type { RouteDefinition, ServerDeps, ServerOptions } from './types/index.js';
import './types/fastify.js';

// Config
import { type ApiConfig, API_CONFIG } from './config/index.js';
import { PermissionRegistry } from '../auth/index.js';
import { logger } from '../services/Logger.js';
import { LOG_MESSAGES } from './constants/messages.js';

function buildLoggerOptions(config: ApiConfig, enabled: boolean): FastifyServerOptions['logger'] {
  if (!enabled) return false;
  if (!config.logger.pretty) return { level: config.logger.level };

  return {
    level: config.logger.level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  };
}

/**
 * Every route the server exposes, with the permission each one requires
 */
export function collectRoutes(deps: ServerDeps, config: ApiConfig = API_CONFIG): RouteDefinition[] {
  return [
    ...healthRoutes(deps, config.version),
    ...providerRoutes(deps),
    ...taskRoutes(deps),
  ];
}

// ═══════════════════════════════════════════════════════════════════════════
// Server Factory
// ═══════════════════════════════════════════════════════════════════════════

export async function createServer(deps: ServerDeps, options: ServerOptions = {}) {
  const config = options.config ?? API_CONFIG;
  const { port, host } = config.server;

  const fastify = Fastify({
    logger: buildLoggerOptions(config, options.logger ?? config.logger.enabled),
    genReqId: generateRequestId,
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Plugins
  // ═══════════════════════════════════════════════════════════════════════════

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
  });

  fastify.decorateRequest('principal', null);

  // ═══════════════════════════════════════════════════════════════════════════
  // Hooks
  // ═══════════════════════════════════════════════════════════════════════════

  const timing = createRequestTiming(config.monitoring.slowRequestThresholdMs);
  fastify.addHook('onRequest', timing.onRequest);
  fastify.addHook('onResponse', timing.onResponse);

  const routes = collectRoutes(deps, config);
  const registry = PermissionRegistry.fromRoutes(routes);

  fastify.addHook(
    'preHandler',
    createPermissionGate({ registry, authClient: deps.authClient, auth: deps.auth }),
  );

  // ═══════════════════════════════════════════════════════════════════════════
  // Error Handling
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.setErrorHandler(errorHandler);
  fastify.setNotFoundHandler(notFoundHandler);

  // ═══════════════════════════════════════════════════════════════════════════
  // Routes
  // ═══════════════════════════════════════════════════════════════════════════

  for (const route of routes) {
    fastify.route({ method: route.method, url: route.url, handler: route.handler });
  }

  return { fastify, registry, port, host };
}

// ═══════════════════════════════════════════════════════════════════════════
// Server Startup
// ═══════════════════════════════════════════════════════════════════════════

export async function startServer(deps: ServerDeps, options: ServerOptions = {}) {
  const { fastify, registry, port, host } = await createServer(deps, options);

  await fastify.listen({ port, host });

  logger.banner(`Model Relay API ${(options.config ?? API_CONFIG).version}`, [
    LOG_MESSAGES.SERVER_STARTED(host, port),
    `Providers: ${deps.providers.getProviderNames().join(', ')}`,
    `Auth: ${deps.auth.enabled ? deps.auth.serviceUrl : 'disabled'}`,
    '',
    'Endpoints:',
    '  GET  /health',
    '  GET  /providers',
    ...registry.list().map((entry) => `  ${entry.method.padEnd(4)} ${entry.url}  (${entry.requirement.resource}:${entry.requirement.action})`),
  ]);

  return fastify;
}
