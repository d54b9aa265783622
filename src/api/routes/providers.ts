/**
 * Provider Routes
 */

import type { ProvidersResults, RouteDefinition, ServerDeps } from '../types/index.js';
import { SUCCESS_MESSAGES } from '../constants/messages.js';
import { ok } from '../utils/envelope.js';

export function providerRoutes(deps: Pick<ServerDeps, 'providers'>): RouteDefinition[] {
  return [
    {
      /**
       * GET /providers
       * Registered providers and their supported models
       */
      method: 'GET',
      url: '/providers',
      handler: async () => {
        const results: ProvidersResults = { providers: deps.providers.describe() };
        return ok(SUCCESS_MESSAGES.PROVIDERS_LISTED, results);
      },
    },
  ];
}
