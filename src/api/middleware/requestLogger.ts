/**
 * Request Logger Middleware
 * Request timing and slow-request warnings on top of Fastify's access log
 */

import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';
import { LOG_MESSAGES } from '../constants/messages.js';

// ═══════════════════════════════════════════════════════════════════════════
// Request Timing
// ═══════════════════════════════════════════════════════════════════════════

export interface RequestTimingHooks {
  onRequest(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction): void;
  onResponse(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction): void;
}

/**
 * Hooks that warn when a request takes longer than `slowRequestThresholdMs`
 */
export function createRequestTiming(slowRequestThresholdMs: number): RequestTimingHooks {
  const requestTimes = new Map<string, number>();

  return {
    onRequest(request, _reply, done) {
      requestTimes.set(request.id, Date.now());
      done();
    },

    onResponse(request, reply, done) {
      const startTime = requestTimes.get(request.id);
      requestTimes.delete(request.id);

      if (startTime !== undefined) {
        const duration = Date.now() - startTime;

        if (duration > slowRequestThresholdMs) {
          request.log.warn({
            msg: LOG_MESSAGES.SLOW_REQUEST,
            duration,
            url: request.url,
            method: request.method,
            statusCode: reply.statusCode,
            principal: request.principal?.id,
          });
        }
      }

      done();
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Request ID Generator
// ═══════════════════════════════════════════════════════════════════════════

let requestCounter = 0;

export function generateRequestId(): string {
  requestCounter += 1;
  return `req-${requestCounter}`;
}
