/**
 * Permission Gate
 * preHandler hook enforcing the permission registry on every route
 */

import type { FastifyRequest } from 'fastify';
import type { AuthConfig } from '../../config/config.js';
import { AuthError, PermissionError, getErrorMessage } from '../../core/errors.js';
import {
  ANONYMOUS_PRINCIPAL,
  type AuthGatewayClient,
  type PermissionRegistry,
  extractCredential,
} from '../../auth/index.js';
import type { VerifyResult } from '../../types/index.js';
import { API_ERRORS } from '../constants/messages.js';

export interface PermissionGateOptions {
  registry: PermissionRegistry;
  authClient: AuthGatewayClient;
  auth: Pick<AuthConfig, 'enabled' | 'serviceName'>;
}

export function createPermissionGate(options: PermissionGateOptions) {
  const { registry, authClient, auth } = options;

  return async function permissionGate(request: FastifyRequest): Promise<void> {
    const pattern = request.routeOptions.url;
    if (!pattern) return;

    const requirement = registry.lookup(request.method, pattern);
    if (!requirement) return;

    if (!auth.enabled) {
      request.principal = { ...ANONYMOUS_PRINCIPAL };
      return;
    }

    const credential = extractCredential(request.headers);
    if (!credential) {
      throw new AuthError(API_ERRORS.CREDENTIAL_REQUIRED);
    }

    let verdict: VerifyResult;
    try {
      verdict = await authClient.verify(credential, auth.serviceName, requirement);
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Credential verification failed: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!verdict.allowed) {
      throw new PermissionError(API_ERRORS.PERMISSION_DENIED(requirement.resource, requirement.action), {
        context: { principal: verdict.principal.id },
      });
    }

    request.principal = verdict.principal;
  };
}
