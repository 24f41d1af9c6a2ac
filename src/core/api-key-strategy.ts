/**
 * API Key Strategy - Static Pre-Shared Key Verification
 *
 * Verifies a static key delivered in a named request header against the
 * value configured at startup.
 *
 * CRITICAL POLICIES:
 * - Construction with an empty expected key throws (MisconfiguredStrategy);
 *   an unconfigured verifier must never accept every caller
 * - Comparison is exact and case-sensitive
 * - The submitted key value is never logged
 */

import { timingSafeEqual } from 'crypto';
import { SecurityErrors } from '../utils/errors.js';
import { extractHeaderCredential } from './credentials.js';
import {
  DEFAULT_API_KEY_HEADER,
  DEFAULT_API_KEY_SUBJECT,
  fail,
  succeed,
} from './types.js';
import type { AuthenticationOutcome, RequestCredentials, VerificationStrategy } from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ApiKeyStrategyOptions {
  /** Value the header must equal exactly */
  expectedKey: string;

  /** Header carrying the key (default: 'X-API-Key') */
  headerName?: string;

  /** Subject name of the resulting identity (default: 'API User') */
  subjectName?: string;

  /** Scheme name reported on outcomes (default: 'ApiKey') */
  schemeName?: string;

  /** Roles granted to key holders (default: none) */
  roles?: string[];
}

// ============================================================================
// API Key Strategy Class
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const strategy = new ApiKeyStrategy({ expectedKey: config.apiKey.expectedKey });
 * const outcome = await strategy.authenticate(credentials);
 * if (outcome.status === 'success') {
 *   // outcome.identity.name === 'API User'
 * }
 * ```
 */
export class ApiKeyStrategy implements VerificationStrategy {
  readonly name: string;
  readonly headerName: string;

  private readonly expectedKey: Buffer;
  private readonly subjectName: string;
  private readonly roles: readonly string[];

  /**
   * @throws {AuthSecurityError} MISCONFIGURED_STRATEGY if the expected key or subject is blank
   */
  constructor(options: ApiKeyStrategyOptions) {
    this.name = options.schemeName ?? 'ApiKey';
    this.headerName = options.headerName ?? DEFAULT_API_KEY_HEADER;
    this.subjectName = options.subjectName ?? DEFAULT_API_KEY_SUBJECT;
    this.roles = Object.freeze([...(options.roles ?? [])]);

    if (typeof options.expectedKey !== 'string' || options.expectedKey.trim().length === 0) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY(this.name, 'expected API key is not set');
    }

    if (this.headerName.trim().length === 0) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY(this.name, 'header name is empty');
    }

    if (this.subjectName.trim().length === 0) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY(this.name, 'subject name is empty');
    }

    this.expectedKey = Buffer.from(options.expectedKey, 'utf8');
  }

  async authenticate(credentials: RequestCredentials): Promise<AuthenticationOutcome> {
    const extracted = extractHeaderCredential(credentials, this.headerName);

    if (!extracted.ok) {
      if (extracted.reason === 'MissingCredential') {
        console.warn(`[ApiKeyStrategy] ${this.headerName} header not found`);
      } else {
        console.warn(`[ApiKeyStrategy] ${this.headerName} header is empty`);
      }
      return fail(this.name, extracted.reason);
    }

    if (!this.matches(extracted.value)) {
      console.warn(`[ApiKeyStrategy] Invalid API key presented in ${this.headerName}`);
      return fail(this.name, 'InvalidCredential');
    }

    console.info(`[ApiKeyStrategy] API key validated for ${this.subjectName}`);
    return succeed({
      name: this.subjectName,
      roles: [...this.roles],
      claims: {},
      scheme: this.name,
    });
  }

  /**
   * Byte-for-byte comparison; lengths differ → mismatch
   */
  private matches(candidate: string): boolean {
    const presented = Buffer.from(candidate, 'utf8');
    if (presented.length !== this.expectedKey.length) {
      return false;
    }
    return timingSafeEqual(presented, this.expectedKey);
  }
}
