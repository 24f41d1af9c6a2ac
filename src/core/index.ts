/**
 * Core Module Public API
 *
 * Strategies, scheme routing and the authorization gate. One-way dependency:
 * Core → Config → HTTP
 */

// ============================================================================
// Strategies
// ============================================================================

export { ApiKeyStrategy } from './api-key-strategy.js';
export type { ApiKeyStrategyOptions } from './api-key-strategy.js';

export { ExternalCookieStrategy } from './cookie-strategy.js';
export type {
  ExternalCookieStrategyOptions,
  ExternalIdentityProvider,
  ExternalVerification,
} from './cookie-strategy.js';

export { JwtCookieProvider } from './jwt-cookie-provider.js';
export type { JwtCookieProviderOptions } from './jwt-cookie-provider.js';

export { InMemoryCredentialStore } from './credential-store.js';
export type { CredentialStore, StoredPrincipal } from './credential-store.js';

// ============================================================================
// Routing & Authorization
// ============================================================================

export { SchemeRegistry, SchemeRegistryBuilder, SchemeRouter } from './scheme-router.js';
export type { SchemeRegistration } from './scheme-router.js';

export {
  evaluateAccess,
  requireRole,
  requireAnyRole,
  requireAllRoles,
  requireClaim,
} from './authorization-gate.js';
export type { AccessDecision, RolePredicate } from './authorization-gate.js';

export {
  getHeader,
  getCookie,
  extractHeaderCredential,
  extractCookieCredential,
  parseCookieHeader,
  credentialsFromHeaders,
} from './credentials.js';
export type { ExtractionResult } from './credentials.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Types & Constants
// ============================================================================

export type {
  RequestCredentials,
  Identity,
  FailureReason,
  AuthenticationOutcome,
  AuthenticationSuccess,
  AuthenticationFailure,
  VerificationStrategy,
  AuditEntry,
} from './types.js';

export {
  succeed,
  fail,
  isSuccess,
  FAILURE_REASONS,
  ROLE_ADMINISTRATOR,
  ROLE_CUSTOMER,
  DEFAULT_API_KEY_HEADER,
  DEFAULT_API_KEY_SUBJECT,
} from './types.js';
