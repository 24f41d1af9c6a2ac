/**
 * External Cookie Strategy
 *
 * A scheme whose session cookie is verified by an external identity provider.
 * This strategy only locates the cookie and relays the provider's verdict;
 * the cookie's content is opaque to it.
 */

import { sanitizeError } from '../utils/errors.js';
import { extractCookieCredential } from './credentials.js';
import { fail, succeed } from './types.js';
import type {
  AuthenticationOutcome,
  Identity,
  RequestCredentials,
  VerificationStrategy,
} from './types.js';

// ============================================================================
// External Provider Contract
// ============================================================================

export type ExternalVerification =
  | { verified: true; identity: Omit<Identity, 'scheme'> }
  | { verified: false; reason: string };

/**
 * Opaque collaborator that verifies a session cookie's content
 * (an OIDC client, an Identity cookie validator, a JWT verifier, ...).
 */
export interface ExternalIdentityProvider {
  verify(cookieValue: string): Promise<ExternalVerification>;
}

export interface ExternalCookieStrategyOptions {
  /** Scheme name (e.g., 'Cookies', 'OpenIdConnect') */
  name: string;

  /** Cookie holding the session issued by the provider */
  cookieName: string;

  provider: ExternalIdentityProvider;
}

// ============================================================================
// External Cookie Strategy Class
// ============================================================================

export class ExternalCookieStrategy implements VerificationStrategy {
  readonly name: string;
  readonly cookieName: string;
  private readonly provider: ExternalIdentityProvider;

  constructor(options: ExternalCookieStrategyOptions) {
    this.name = options.name;
    this.cookieName = options.cookieName;
    this.provider = options.provider;
  }

  async authenticate(credentials: RequestCredentials): Promise<AuthenticationOutcome> {
    const extracted = extractCookieCredential(credentials, this.cookieName);

    if (!extracted.ok) {
      console.warn(`[ExternalCookieStrategy:${this.name}] ${extracted.reason} (${this.cookieName})`);
      return fail(this.name, extracted.reason);
    }

    let verification: ExternalVerification;
    try {
      verification = await this.provider.verify(extracted.value);
    } catch (error) {
      console.warn(
        `[ExternalCookieStrategy:${this.name}] Identity provider error:`,
        sanitizeError(error)
      );
      return fail(this.name, 'InvalidCredential');
    }

    if (!verification.verified) {
      console.warn(`[ExternalCookieStrategy:${this.name}] Cookie rejected: ${verification.reason}`);
      return fail(this.name, 'InvalidCredential');
    }

    if (verification.identity.name.trim().length === 0) {
      console.warn(`[ExternalCookieStrategy:${this.name}] Provider returned an identity without a name`);
      return fail(this.name, 'InvalidCredential');
    }

    console.info(`[ExternalCookieStrategy:${this.name}] Authenticated ${verification.identity.name}`);
    return succeed({ ...verification.identity, scheme: this.name });
  }
}
