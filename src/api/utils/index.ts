/**
 * API Utilities
 */

export * from './envelope.js';
export * from './validation.js';
