/**
 * API Configuration
 * HTTP server settings read from the environment
 */

import { type Env, getEnvBoolean, getEnvNumber, getEnvString } from '../../config/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// API Configuration
// ═══════════════════════════════════════════════════════════════════════════

export interface ApiConfig {
  version: string;
  server: {
    port: number;
    host: string;
  };
  monitoring: {
    /** Threshold in ms for logging slow requests */
    slowRequestThresholdMs: number;
  };
  logger: {
    /** Fastify access log on/off */
    enabled: boolean;
    level: string;
    pretty: boolean;
  };
}

export function loadApiConfig(env: Env = process.env): ApiConfig {
  return {
    version: getEnvString(env, 'API_VERSION', '1.0.0'),
    server: {
      port: getEnvNumber(env, 'API_PORT', 8080),
      host: getEnvString(env, 'API_HOST', '0.0.0.0'),
    },
    monitoring: {
      slowRequestThresholdMs: getEnvNumber(env, 'SLOW_REQUEST_THRESHOLD_MS', 1000),
    },
    logger: {
      enabled: getEnvBoolean(env, 'ACCESS_LOG', true),
      level: getEnvString(env, 'LOG_LEVEL', 'info'),
      pretty: env.NODE_ENV !== 'production',
    },
  };
}

export const API_CONFIG: ApiConfig = loadApiConfig();

// ═══════════════════════════════════════════════════════════════════════════
// Type exports
// ═══════════════════════════════════════════════════════════════════════════

export type ServerConfig = ApiConfig['server'];
export type MonitoringConfig = ApiConfig['monitoring'];
