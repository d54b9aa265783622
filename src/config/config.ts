/**
 * Model Relay - Configuration
 * Environment-driven configuration for the store, queue, providers, auth and executor
 */

import type { LogLevel, ProviderDescriptor } from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';
import {
  DEFAULT_BASE_URLS,
  DEFAULT_SUPPORTED_MODELS,
  DEFAULT_TASK_TIME_LIMIT_S,
  PROVIDER_NAMES,
  SERVICE_NAME,
} from './constants.js';

export type Env = Record<string, string | undefined>;

export interface AuthConfig {
  enabled: boolean;
  serviceUrl: string;
  serviceName: string;
  timeoutMs: number;
}

export interface ExecutorConfig {
  enabled: boolean;
  concurrency: number;
  /** Per-attempt provider timeout */
  providerTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Processing tasks untouched for longer than this are failed by the reaper */
  staleAfterMs: number;
  reapIntervalMs: number;
}

export interface QueueConfig {
  /** How often an idle worker re-reads a file:// queue */
  pollIntervalMs: number;
  /** Delivered jobs unsettled for longer than this are redelivered */
  visibilityTimeoutMs: number;
}

export interface RelayConfig {
  logLevel: LogLevel;
  dataStoreUrl: string;
  queueBrokerUrl: string;
  queue: QueueConfig;
  taskTimeLimitS: number;
  providers: ProviderDescriptor[];
  auth: AuthConfig;
  executor: ExecutorConfig;
}

// ═══════════════════════════════════════════════════════════════════════════
// Environment helpers
// ═══════════════════════════════════════════════════════════════════════════

export const getEnvNumber = (env: Env, key: string, defaultValue: number): number => {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
};

export const getEnvString = (env: Env, key: string, defaultValue: string): string => {
  return env[key] || defaultValue;
};

export const getEnvBoolean = (env: Env, key: string, defaultValue: boolean): boolean => {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value);
};

export const getEnvList = (env: Env, key: string, defaultValue: readonly string[]): string[] => {
  const value = env[key];
  if (!value) return [...defaultValue];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigurationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

// ═══════════════════════════════════════════════════════════════════════════
// Loader
// ═══════════════════════════════════════════════════════════════════════════

function loadProviders(env: Env, timeoutMs: number): ProviderDescriptor[] {
  return PROVIDER_NAMES.map((name) => {
    const prefix = name.toUpperCase();
    const baseUrl = env[`${prefix}_API_URL`] || DEFAULT_BASE_URLS[name];
    return {
      name,
      models: getEnvList(env, `${prefix}_SUPPORTED_MODELS`, DEFAULT_SUPPORTED_MODELS[name]),
      apiKey: env[`${prefix}_API_KEY`] || undefined,
      baseUrl,
      timeoutMs,
    };
  });
}

/**
 * Throw unless the store and queue can be shared by several processes.
 * `memory://` backends only exist inside the process that created them.
 */
export function requireSharedBackends(config: Pick<RelayConfig, 'dataStoreUrl' | 'queueBrokerUrl'>, reason: string): void {
  const local = [
    ['DATA_STORE_URL', config.dataStoreUrl],
    ['QUEUE_BROKER_URL', config.queueBrokerUrl],
  ].filter(([, url]) => url.startsWith('memory://'));

  if (local.length > 0) {
    const names = local.map(([key]) => key).join(' and ');
    throw new ConfigurationError(`${reason} needs ${names} shared between processes; memory:// is not`);
  }
}

/**
 * Build the relay configuration from environment variables
 */
export function loadConfig(env: Env = process.env): RelayConfig {
  const taskTimeLimitS = getEnvNumber(env, 'TASK_TIME_LIMIT', DEFAULT_TASK_TIME_LIMIT_S);
  if (taskTimeLimitS <= 0) {
    throw new ConfigurationError('TASK_TIME_LIMIT must be a positive number of seconds');
  }

  const providerTimeoutMs = getEnvNumber(env, 'PROVIDER_TIMEOUT_MS', taskTimeLimitS * 1000);
  const concurrency = getEnvNumber(env, 'EXECUTOR_CONCURRENCY', 4);
  if (concurrency < 1) {
    throw new ConfigurationError('EXECUTOR_CONCURRENCY must be at least 1');
  }

  const maxRetries = getEnvNumber(env, 'TASK_MAX_RETRIES', 3);
  const retryMaxDelayMs = getEnvNumber(env, 'TASK_RETRY_MAX_DELAY_MS', 30000);
  // Longest run a live worker can legitimately take
  const longestRunMs = (maxRetries + 1) * providerTimeoutMs + maxRetries * retryMaxDelayMs;
  const staleAfterMs = getEnvNumber(env, 'TASK_STALE_AFTER_MS', longestRunMs);

  const config: RelayConfig = {
    logLevel: parseLogLevel(getEnvString(env, 'LOG_LEVEL', 'info')),
    dataStoreUrl: getEnvString(env, 'DATA_STORE_URL', 'file://./data/tasks.json'),
    queueBrokerUrl: getEnvString(env, 'QUEUE_BROKER_URL', 'file://./data/queue.json'),
    queue: {
      pollIntervalMs: getEnvNumber(env, 'QUEUE_POLL_INTERVAL_MS', 250),
      visibilityTimeoutMs: getEnvNumber(env, 'QUEUE_VISIBILITY_TIMEOUT_MS', staleAfterMs),
    },
    taskTimeLimitS,
    providers: loadProviders(env, providerTimeoutMs),
    auth: {
      enabled: getEnvBoolean(env, 'AUTH_ENABLED', false),
      serviceUrl: getEnvString(env, 'AUTH_SERVICE_URL', 'http://localhost:9000'),
      serviceName: getEnvString(env, 'SERVICE_NAME', SERVICE_NAME),
      timeoutMs: getEnvNumber(env, 'AUTH_TIMEOUT_MS', 5000),
    },
    executor: {
      enabled: getEnvBoolean(env, 'EXECUTOR_ENABLED', true),
      concurrency,
      providerTimeoutMs,
      maxRetries,
      retryBaseDelayMs: getEnvNumber(env, 'TASK_RETRY_BASE_DELAY_MS', 1000),
      retryMaxDelayMs,
      staleAfterMs,
      reapIntervalMs: getEnvNumber(env, 'TASK_REAP_INTERVAL_MS', 60000),
    },
  };

  if (!config.executor.enabled) {
    requireSharedBackends(config, 'EXECUTOR_ENABLED=false');
  }
  return config;
}
