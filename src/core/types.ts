/**
 * Core Authentication Types
 *
 * Data model shared by every verification strategy, the scheme router and
 * the authorization gate. Nothing in this file depends on express or on the
 * configuration layer.
 *
 * Architectural Rule: Core → Config → HTTP
 * Files in src/core/ MUST NOT import from src/config/ or src/http/
 */

import type { HeaderMap } from '../types/index.js';

// ============================================================================
// Role Constants
// ============================================================================

export const ROLE_ADMINISTRATOR = 'Administrator';
export const ROLE_CUSTOMER = 'Customer';

/** Subject name assigned to callers authenticated by the static API key */
export const DEFAULT_API_KEY_SUBJECT = 'API User';

/** Header carrying the static API key unless configured otherwise */
export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

// ============================================================================
// Credential Source
// ============================================================================

/**
 * Credential material of one inbound request.
 *
 * Header names are matched case-insensitively; cookie names exactly.
 */
export interface RequestCredentials {
  headers: HeaderMap;
  cookies: Record<string, string>;
}

// ============================================================================
// Identity & Outcome
// ============================================================================

/**
 * Verified caller.
 *
 * INVARIANT: `name` is never empty on an identity carried by a success outcome.
 */
export interface Identity {
  /** Subject name (e.g., 'API User', 'alice') */
  name: string;

  /** Role claims, in the order the strategy produced them */
  roles: string[];

  /** Additional claim key/value pairs */
  claims: Record<string, string>;

  /** Name of the scheme that authenticated this identity */
  scheme: string;
}

/**
 * Per-request failure kinds. These are for logs and audit only; the HTTP
 * boundary collapses all of them into one generic 401.
 */
export type FailureReason = 'MissingCredential' | 'EmptyCredential' | 'InvalidCredential';

export const FAILURE_REASONS: readonly FailureReason[] = [
  'MissingCredential',
  'EmptyCredential',
  'InvalidCredential',
];

export interface AuthenticationSuccess {
  status: 'success';
  identity: Identity;
}

export interface AuthenticationFailure {
  status: 'failure';
  reason: FailureReason;
  scheme: string;
}

export type AuthenticationOutcome = AuthenticationSuccess | AuthenticationFailure;

/**
 * Build a success outcome.
 *
 * @throws {Error} If the identity has an empty subject name
 */
export function succeed(identity: Identity): AuthenticationSuccess {
  if (identity.name.trim().length === 0) {
    throw new Error(`Scheme "${identity.scheme}" produced an identity without a subject name`);
  }

  return {
    status: 'success',
    identity: {
      name: identity.name,
      roles: [...identity.roles],
      claims: { ...identity.claims },
      scheme: identity.scheme,
    },
  };
}

export function fail(scheme: string, reason: FailureReason): AuthenticationFailure {
  return { status: 'failure', reason, scheme };
}

export function isSuccess(outcome: AuthenticationOutcome): outcome is AuthenticationSuccess {
  return outcome.status === 'success';
}

// ============================================================================
// Strategy
// ============================================================================

/**
 * One pluggable method of verifying a credential.
 *
 * Implementations hold immutable configuration set at construction and no
 * per-request state.
 */
export interface VerificationStrategy {
  /** Scheme name reported on outcomes and in logs (e.g., 'ApiKey') */
  readonly name: string;

  authenticate(credentials: RequestCredentials): Promise<AuthenticationOutcome>;
}

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field identifying their origin
 * (e.g., 'auth:ApiKey', 'secret:resolution').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the entry */
  source: string;

  /** Subject associated with the event (if known) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Machine-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
