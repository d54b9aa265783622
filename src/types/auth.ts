/**
 * Auth types shared by the permission gate and the orchestrator
 */

export type CredentialKind = 'bearer' | 'api_key';

export interface Credential {
  kind: CredentialKind;
  value: string;
}

/**
 * `system` may act across every principal of its tenant,
 * `user` is limited to its own tasks.
 */
export type PrincipalScope = 'system' | 'user';

export interface Principal {
  id: string;
  scope: PrincipalScope;
  tenantId: string | null;
  credentialKind: CredentialKind | 'anonymous';
}

export interface PermissionRequirement {
  resource: string;
  action: string;
}

export interface VerifyResult {
  allowed: boolean;
  principal: Principal;
}
