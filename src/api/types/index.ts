/**
 * API Types - Shared type definitions
 */

import type { FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import type { AuthConfig } from '../../config/config.js';
import type { AuthGatewayClient } from '../../auth/index.js';
import type { TaskExecutor } from '../../executor/index.js';
import type { ProviderRegistry, ProviderSummary } from '../../providers/index.js';
import type { JobQueue } from '../../queue/index.js';
import type { TaskStore } from '../../store/index.js';
import type { TaskOrchestrator, TaskRunner } from '../../tasks/index.js';
import type { PoolStatus } from '../../core/pool.js';
import type { PermissionRequirement } from '../../types/index.js';
import type { ApiConfig } from '../config/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Response Envelope
// ═══════════════════════════════════════════════════════════════════════════

export interface Envelope<T> {
  success: boolean;
  message: string;
  results: T;
}

export interface ErrorResults {
  code: string;
  field?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// Route Declarations
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A route and the permission it requires, declared together. Routes without
 * `permission` are public.
 */
export interface RouteDefinition {
  method: HTTPMethods;
  url: string;
  permission?: PermissionRequirement;
  handler(request: FastifyRequest, reply: FastifyReply): Promise<unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Server Types
// ═══════════════════════════════════════════════════════════════════════════

export interface ServerDeps {
  orchestrator: TaskOrchestrator;
  providers: ProviderRegistry;
  store: TaskStore;
  queue: JobQueue;
  authClient: AuthGatewayClient;
  auth: AuthConfig;
  /** Present when this process also runs workers */
  executor?: TaskExecutor | null;
  /** Source of the invocation pool figures reported by /health */
  runner?: TaskRunner | null;
}

export interface ServerOptions {
  /** Fastify access logging; defaults to the API config */
  logger?: boolean;
  config?: ApiConfig;
}

// ═══════════════════════════════════════════════════════════════════════════
// Health & Providers
// ═══════════════════════════════════════════════════════════════════════════

export interface HealthResults {
  status: 'ok' | 'degraded';
  version: string;
  timestamp: string;
  uptime: number;
  store: 'ok' | 'unreachable';
  queue: { reachable: boolean; size: number | null };
  executor: { running: boolean };
  /** Provider calls in flight in this process; null without a runner */
  invocations: PoolStatus | null;
}

export interface ProvidersResults {
  providers: ProviderSummary[];
}
