/**
 * Error Handler Middleware
 * Maps every error onto the response envelope
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { RelayError, ValidationError } from '../../core/errors.js';
import { API_ERRORS } from '../constants/messages.js';
import { errorEnvelope } from '../utils/envelope.js';

// ═══════════════════════════════════════════════════════════════════════════
// Error Handler
// ═══════════════════════════════════════════════════════════════════════════

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof RelayError) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, error.message);
    } else {
      request.log.info({ code: error.code }, error.message);
    }

    const field = error instanceof ValidationError ? error.field : undefined;
    reply.status(error.statusCode).send(errorEnvelope(error.message, error.code, field));
    return;
  }

  // Fastify's own client errors: bad JSON, body too large, unsupported media type
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
    request.log.info({ err: error }, error.message);
    reply.status(error.statusCode).send(errorEnvelope(error.message || API_ERRORS.BAD_REQUEST, 'VALIDATION_ERROR'));
    return;
  }

  request.log.error({ err: error }, 'Unhandled error');
  reply.status(500).send(errorEnvelope(API_ERRORS.INTERNAL_ERROR, 'INTERNAL_ERROR'));
}

// ═══════════════════════════════════════════════════════════════════════════
// Not Found Handler
// ═══════════════════════════════════════════════════════════════════════════

export function notFoundHandler(
  request: FastifyRequest,
  reply: FastifyReply
): void {
  reply
    .status(404)
    .send(errorEnvelope(API_ERRORS.ROUTE_NOT_FOUND(request.method, request.url), 'NOT_FOUND'));
}
