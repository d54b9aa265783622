/**
 * Fastify Type Extensions
 */

import type { Principal } from '../../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Request Decorations
// ═══════════════════════════════════════════════════════════════════════════

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by the permission gate on protected routes */
    principal: Principal | null;
  }
}

export {};
