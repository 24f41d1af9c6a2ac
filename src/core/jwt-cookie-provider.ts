/**
 * JWT Cookie Provider - Signed Session Cookie Verification
 *
 * External identity provider for cookie schemes whose cookie carries a
 * signed JWT (federated sign-in, identity cookies re-issued as JWTs).
 *
 * Responsibilities:
 * - Signature verification (shared secret, HS* algorithms)
 * - Claim validation (iss, aud, exp, nbf)
 * - Name/role claim extraction
 * - Optional enrichment from a CredentialStore
 *
 * NOT responsible for:
 * - Locating the cookie (ExternalCookieStrategy)
 * - Issuing cookies (external identity provider)
 */

import { errors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import type { CredentialStore } from './credential-store.js';
import type { ExternalIdentityProvider, ExternalVerification } from './cookie-strategy.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface JwtCookieProviderOptions {
  /** Shared signing secret */
  secret: string;

  /** Expected `iss` claim */
  issuer: string;

  /** Expected `aud` claim */
  audience: string;

  /** Allowed algorithms (default: ['HS256']) */
  algorithms?: string[];

  /** Claim holding the display/subject name (default: 'name', falls back to 'sub') */
  nameClaim?: string;

  /** Claim holding roles, string or string[] (default: 'roles') */
  rolesClaim?: string;

  /** Clock skew tolerance in seconds (default: 30) */
  clockTolerance?: number;

  /** When set, the subject must exist (and not be disabled) in this store */
  credentialStore?: CredentialStore;
}

const REGISTERED_CLAIMS = new Set(['iss', 'aud', 'exp', 'nbf', 'iat', 'jti']);

// ============================================================================
// JWT Cookie Provider Class
// ============================================================================

export class JwtCookieProvider implements ExternalIdentityProvider {
  private readonly key: Uint8Array;
  private readonly options: Required<Omit<JwtCookieProviderOptions, 'credentialStore' | 'secret'>>;
  private readonly credentialStore?: CredentialStore;

  constructor(options: JwtCookieProviderOptions) {
    if (options.secret.length === 0) {
      throw new Error('JwtCookieProvider requires a signing secret');
    }

    this.key = new TextEncoder().encode(options.secret);
    this.credentialStore = options.credentialStore;
    this.options = {
      issuer: options.issuer,
      audience: options.audience,
      algorithms: options.algorithms ?? ['HS256'],
      nameClaim: options.nameClaim ?? 'name',
      rolesClaim: options.rolesClaim ?? 'roles',
      clockTolerance: options.clockTolerance ?? 30,
    };
  }

  async verify(cookieValue: string): Promise<ExternalVerification> {
    let payload: JWTPayload;
    try {
      const result = await jwtVerify(cookieValue, this.key, {
        issuer: this.options.issuer,
        audience: this.options.audience,
        algorithms: this.options.algorithms,
        clockTolerance: this.options.clockTolerance,
      });
      payload = result.payload;
    } catch (error) {
      if (error instanceof errors.JOSEError) {
        return { verified: false, reason: error.code };
      }
      throw error;
    }

    const name = this.readName(payload);
    if (!name) {
      return { verified: false, reason: 'ERR_MISSING_NAME_CLAIM' };
    }

    const subject = typeof payload.sub === 'string' && payload.sub.length > 0 ? payload.sub : name;
    const roles = this.readRoles(payload);
    const claims = this.readClaims(payload);

    if (!this.credentialStore) {
      return { verified: true, identity: { name, roles, claims } };
    }

    const stored = await this.credentialStore.lookup(subject);
    if (!stored) {
      return { verified: false, reason: 'ERR_UNKNOWN_SUBJECT' };
    }
    if (stored.disabled) {
      return { verified: false, reason: 'ERR_SUBJECT_DISABLED' };
    }

    const mergedRoles = [...roles];
    for (const role of stored.roles) {
      if (!mergedRoles.includes(role)) {
        mergedRoles.push(role);
      }
    }

    return {
      verified: true,
      identity: { name, roles: mergedRoles, claims: { ...claims, ...stored.claims } },
    };
  }

  private readName(payload: JWTPayload): string | undefined {
    const candidates = [payload[this.options.nameClaim], payload.sub];
    for (const candidate of candidates) {
      if (typeof candidate === 'string' && candidate.trim().length > 0) {
        return candidate;
      }
    }
    return undefined;
  }

  private readRoles(payload: JWTPayload): string[] {
    const raw = payload[this.options.rolesClaim];
    if (typeof raw === 'string') {
      return raw.length > 0 ? [raw] : [];
    }
    if (Array.isArray(raw)) {
      return raw.filter((role): role is string => typeof role === 'string' && role.length > 0);
    }
    return [];
  }

  private readClaims(payload: JWTPayload): Record<string, string> {
    const claims: Record<string, string> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (REGISTERED_CLAIMS.has(key) || key === this.options.rolesClaim) {
        continue;
      }
      if (typeof value === 'string') {
        claims[key] = value;
      }
    }
    return claims;
  }
}
