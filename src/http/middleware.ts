/**
 * HTTP Authentication Middleware
 *
 * Express glue around the core:
 * - createAuthenticationMiddleware() runs the SchemeRouter once per request
 * - withAuthorization() wraps a handler in the authorization gate
 *
 * CRITICAL SECURITY:
 * - Every authentication failure maps to the same 401 body; the failure
 *   reason goes to logs only
 * - Submitted credentials are never echoed back
 * - A route wrapped without the authentication middleware fails closed (401)
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { evaluateAccess } from '../core/authorization-gate.js';
import type { RolePredicate } from '../core/authorization-gate.js';
import { credentialsFromHeaders } from '../core/credentials.js';
import type { SchemeRouter } from '../core/scheme-router.js';
import type { AuthenticationOutcome, Identity } from '../core/types.js';
import { DEFAULT_API_KEY_HEADER } from '../core/types.js';
import { SecurityErrors, createErrorResponse } from '../utils/errors.js';

// ============================================================================
// Per-request Outcome
// ============================================================================

const outcomes = new WeakMap<Request, AuthenticationOutcome>();

export function getAuthOutcome(req: Request): AuthenticationOutcome | undefined {
  return outcomes.get(req);
}

/**
 * Runs the router and records the outcome on the request. Never rejects the
 * request itself; guards decide.
 */
export function createAuthenticationMiddleware(router: SchemeRouter): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    router.authenticate(credentialsFromHeaders(req.headers)).then(
      (outcome) => {
        outcomes.set(req, outcome);
        next();
      },
      (error: unknown) => next(error)
    );
  };
}

// ============================================================================
// Authorization Guard
// ============================================================================

export interface AuthorizationOptions {
  /** Role/claim requirement; omitted → any authenticated identity */
  predicate?: RolePredicate;

  /** Realm advertised in WWW-Authenticate (default: 'storefront') */
  realm?: string;

  /** API key header advertised in WWW-Authenticate (default: 'X-API-Key') */
  headerName?: string;
}

export type AuthorizedHandler = (
  req: Request,
  res: Response,
  identity: Identity
) => void | Promise<void>;

/**
 * Wrap a handler so it only runs for an allowed identity.
 *
 * @example
 * ```typescript
 * app.delete(
 *   '/api/products/:id',
 *   withAuthorization(deleteProduct, { predicate: requireRole(ROLE_ADMINISTRATOR) })
 * );
 * ```
 */
export function withAuthorization(
  handler: AuthorizedHandler,
  options: AuthorizationOptions = {}
): RequestHandler {
  const realm = options.realm ?? 'storefront';
  const headerName = options.headerName ?? DEFAULT_API_KEY_HEADER;

  return (req: Request, res: Response, next: NextFunction) => {
    const outcome = outcomes.get(req);

    if (!outcome) {
      console.error(
        `[AuthorizationGuard] No authentication outcome for ${req.method} ${req.path} - is the authentication middleware mounted?`
      );
    }

    const decision = evaluateAccess(
      outcome ?? { status: 'failure', reason: 'MissingCredential', scheme: 'none' },
      options.predicate
    );

    if (decision.decision === 'unauthenticated') {
      const { statusCode, body } = createErrorResponse(SecurityErrors.UNAUTHENTICATED());
      res.setHeader('WWW-Authenticate', `ApiKey realm="${realm}", header="${headerName}"`);
      res.status(statusCode).json(body);
      return;
    }

    if (decision.decision === 'forbidden') {
      console.warn(
        `[AuthorizationGuard] ${decision.identity.name} lacks the required role for ${req.method} ${req.path}`
      );
      const { statusCode, body } = createErrorResponse(SecurityErrors.UNAUTHORIZED_ROLE());
      res.status(statusCode).json(body);
      return;
    }

    Promise.resolve()
      .then(() => handler(req, res, decision.identity))
      .catch((error: unknown) => next(error));
  };
}
