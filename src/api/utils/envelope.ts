/**
 * Response envelope helpers: every reply is `{success, message, results}`
 */

import type { Envelope, ErrorResults } from '../types/index.js';

export function ok<T>(message: string, results: T): Envelope<T> {
  return { success: true, message, results };
}

export function fail<T>(message: string, results: T): Envelope<T> {
  return { success: false, message, results };
}

export function errorEnvelope(message: string, code: string, field?: string): Envelope<ErrorResults> {
  return fail(message, field ? { code, field } : { code });
}
