/**
 * Auth Gateway Client
 * Verifies a caller credential against the external auth service
 */

import type {
  Credential,
  PermissionRequirement,
  Principal,
  PrincipalScope,
  VerifyResult,
} from '../types/index.js';
import { AuthError, getErrorMessage } from '../core/errors.js';

export interface AuthGatewayClient {
  verify(credential: Credential, serviceName: string, requirement: PermissionRequirement): Promise<VerifyResult>;
}

export interface HttpAuthGatewayOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Principal used for every request while authentication is disabled
 */
export const ANONYMOUS_PRINCIPAL: Readonly<Principal> = Object.freeze({
  id: 'anonymous',
  scope: 'system',
  tenantId: null,
  credentialKind: 'anonymous',
});

type HeaderBag = Record<string, string | string[] | undefined>;

function firstHeader(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Read the caller credential: `Authorization: Bearer <token>` first,
 * then `X-API-Key`. Header names must be lower-case, as Node delivers them.
 */
export function extractCredential(headers: HeaderBag): Credential | null {
  const authorization = firstHeader(headers, 'authorization')?.trim();
  if (authorization) {
    const match = /^Bearer\s+(.+)$/i.exec(authorization);
    if (match) {
      return { kind: 'bearer', value: match[1].trim() };
    }
  }

  const apiKey = firstHeader(headers, 'x-api-key')?.trim();
  if (apiKey) {
    return { kind: 'api_key', value: apiKey };
  }

  return null;
}

function parseScope(value: unknown): PrincipalScope {
  return value === 'system' ? 'system' : 'user';
}

/**
 * Parse the gateway's `{allowed, principal: {id, scope, tenant_id}}` reply
 */
export function parseVerifyResponse(body: unknown, credential: Credential): VerifyResult {
  if (typeof body !== 'object' || body === null || !('allowed' in body) || typeof body.allowed !== 'boolean') {
    throw new AuthError('Auth service returned a malformed response');
  }
  if (!('principal' in body) || typeof body.principal !== 'object' || body.principal === null) {
    throw new AuthError('Auth service response carries no principal');
  }

  const principal = body.principal;
  if (!('id' in principal) || typeof principal.id !== 'string' || principal.id === '') {
    throw new AuthError('Auth service response carries no principal id');
  }
  const tenantId = 'tenant_id' in principal && typeof principal.tenant_id === 'string' ? principal.tenant_id : null;

  return {
    allowed: body.allowed,
    principal: {
      id: principal.id,
      scope: parseScope('scope' in principal ? principal.scope : undefined),
      tenantId,
      credentialKind: credential.kind,
    },
  };
}

export class HttpAuthGatewayClient implements AuthGatewayClient {
  private readonly verifyUrl: string;

  constructor(private readonly options: HttpAuthGatewayOptions) {
    this.verifyUrl = `${options.baseUrl.replace(/\/+$/, '')}/verify`;
  }

  async verify(credential: Credential, serviceName: string, requirement: PermissionRequirement): Promise<VerifyResult> {
    let response: Response;
    try {
      response = await fetch(this.verifyUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          credential_type: credential.kind,
          credential: credential.value,
          service: serviceName,
          resource: requirement.resource,
          action: requirement.action,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new AuthError(`Auth service unreachable: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    if (!response.ok) {
      throw new AuthError(`Auth service rejected the credential (HTTP ${response.status})`, {
        context: { status: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthError('Auth service returned a non-JSON body', {
        cause: error instanceof Error ? error : undefined,
      });
    }
    return parseVerifyResponse(body, credential);
  }
}
