/**
 * Authorization Gate
 *
 * Pure three-way decision over an authentication outcome:
 * - Failure                        → unauthenticated (401)
 * - Success, role predicate fails  → forbidden (403)
 * - Success, predicate passes/none → allow, exposing the identity
 *
 * @example
 * ```typescript
 * const decision = evaluateAccess(outcome, requireRole(ROLE_ADMINISTRATOR));
 * if (decision.decision === 'allow') {
 *   deleteProduct(id, decision.identity);
 * }
 * ```
 */

import type { AuthenticationOutcome, Identity } from './types.js';

export type RolePredicate = (identity: Identity) => boolean;

export type AccessDecision =
  | { decision: 'allow'; identity: Identity }
  | { decision: 'unauthenticated'; status: 401 }
  | { decision: 'forbidden'; status: 403; reason: 'UnauthorizedRole'; identity: Identity };

export function evaluateAccess(
  outcome: AuthenticationOutcome,
  predicate?: RolePredicate
): AccessDecision {
  if (outcome.status === 'failure') {
    return { decision: 'unauthenticated', status: 401 };
  }

  if (predicate && !predicate(outcome.identity)) {
    return {
      decision: 'forbidden',
      status: 403,
      reason: 'UnauthorizedRole',
      identity: outcome.identity,
    };
  }

  return { decision: 'allow', identity: outcome.identity };
}

// ============================================================================
// Predicates
// ============================================================================

export function requireRole(role: string): RolePredicate {
  return (identity) => identity.roles.includes(role);
}

/**
 * OR logic: "Administrator OR Manager"
 */
export function requireAnyRole(roles: string[]): RolePredicate {
  return (identity) => roles.some((role) => identity.roles.includes(role));
}

/**
 * AND logic; an empty list is always satisfied
 */
export function requireAllRoles(roles: string[]): RolePredicate {
  return (identity) => roles.every((role) => identity.roles.includes(role));
}

export function requireClaim(name: string, value: string): RolePredicate {
  return (identity) => identity.claims[name] === value;
}
