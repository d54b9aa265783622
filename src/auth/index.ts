/**
 * Auth Module
 */

export {
  ANONYMOUS_PRINCIPAL,
  HttpAuthGatewayClient,
  extractCredential,
  parseVerifyResponse,
} from './AuthGatewayClient.js';
export type { AuthGatewayClient, HttpAuthGatewayOptions } from './AuthGatewayClient.js';
export { PermissionRegistry } from './PermissionRegistry.js';
export type { PermissionDeclaration, PermissionEntry } from './PermissionRegistry.js';
