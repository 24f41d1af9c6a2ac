/**
 * Scheme Router - Policy Scheme Dispatch
 *
 * Chooses exactly one verification strategy per request from a registry of
 * (marker cookie → strategy) pairs, then delegates to it.
 *
 * Selection:
 * 1. Markers are tried in registration order
 * 2. The first marker whose cookie is present on the request wins
 *    (presence only; an empty cookie value still selects the scheme)
 * 3. No marker present → the default strategy
 *
 * A browser holding marker cookies for two schemes is routed to the one
 * registered first; the other scheme's cookie is ignored until it is cleared.
 */

import { SecurityErrors, sanitizeError } from '../utils/errors.js';
import { AuditService } from './audit-service.js';
import { getCookie } from './credentials.js';
import type { AuthenticationOutcome, RequestCredentials, VerificationStrategy } from './types.js';

// ============================================================================
// Registry
// ============================================================================

export interface SchemeRegistration {
  /** Cookie name whose presence selects the strategy */
  readonly marker: string;
  readonly strategy: VerificationStrategy;
}

/**
 * Immutable, process-wide scheme table. Build it once at startup with
 * {@link SchemeRegistry.builder}.
 */
export class SchemeRegistry {
  private readonly registrations: readonly SchemeRegistration[];
  readonly defaultStrategy: VerificationStrategy;

  private constructor(registrations: SchemeRegistration[], defaultStrategy: VerificationStrategy) {
    this.registrations = Object.freeze(registrations.map((r) => Object.freeze({ ...r })));
    this.defaultStrategy = defaultStrategy;
    Object.freeze(this);
  }

  static builder(): SchemeRegistryBuilder {
    return new SchemeRegistryBuilder((registrations, defaultStrategy) => {
      return new SchemeRegistry(registrations, defaultStrategy);
    });
  }

  select(credentials: RequestCredentials): VerificationStrategy {
    for (const registration of this.registrations) {
      if (getCookie(credentials, registration.marker) !== undefined) {
        return registration.strategy;
      }
    }
    return this.defaultStrategy;
  }

  /**
   * Registered schemes in priority order (the default is not included)
   */
  schemes(): readonly SchemeRegistration[] {
    return this.registrations;
  }
}

export class SchemeRegistryBuilder {
  private readonly registrations: SchemeRegistration[] = [];
  private defaultStrategy?: VerificationStrategy;
  private built = false;

  /** @internal */
  constructor(
    private readonly create: (
      registrations: SchemeRegistration[],
      defaultStrategy: VerificationStrategy
    ) => SchemeRegistry
  ) {}

  /**
   * Register a marker-selected strategy. Earlier registrations take priority.
   *
   * @throws {AuthSecurityError} MISCONFIGURED_STRATEGY on an empty or duplicate marker
   */
  register(marker: string, strategy: VerificationStrategy): this {
    this.assertOpen();

    if (marker.trim().length === 0) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY(strategy.name, 'scheme marker is empty');
    }

    if (this.registrations.some((r) => r.marker === marker)) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY(
        strategy.name,
        `scheme marker "${marker}" is already registered`
      );
    }

    this.registrations.push({ marker, strategy });
    return this;
  }

  setDefault(strategy: VerificationStrategy): this {
    this.assertOpen();
    this.defaultStrategy = strategy;
    return this;
  }

  /**
   * @throws {AuthSecurityError} MISCONFIGURED_STRATEGY if no default strategy was set
   */
  build(): SchemeRegistry {
    this.assertOpen();

    if (!this.defaultStrategy) {
      throw SecurityErrors.MISCONFIGURED_STRATEGY('SchemeRegistry', 'no default strategy set');
    }

    this.built = true;
    return this.create([...this.registrations], this.defaultStrategy);
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error('SchemeRegistry has already been built');
    }
  }
}

// ============================================================================
// Router
// ============================================================================

export class SchemeRouter {
  private readonly auditService: AuditService;

  constructor(
    private readonly registry: SchemeRegistry,
    auditService?: AuditService
  ) {
    this.auditService = auditService ?? new AuditService(); // Null Object Pattern
  }

  getRegistry(): SchemeRegistry {
    return this.registry;
  }

  /**
   * Select a strategy and return its outcome unchanged.
   */
  async authenticate(credentials: RequestCredentials): Promise<AuthenticationOutcome> {
    const strategy = this.registry.select(credentials);
    console.debug(`[SchemeRouter] Selected scheme: ${strategy.name}`);

    const outcome = await strategy.authenticate(credentials);

    try {
      await this.auditService.log({
        timestamp: new Date(),
        source: `auth:${strategy.name}`,
        userId: outcome.status === 'success' ? outcome.identity.name : undefined,
        action: 'authenticate',
        success: outcome.status === 'success',
        reason: outcome.status === 'failure' ? outcome.reason : undefined,
      });
    } catch (error) {
      // Audit storage failure must not change the authentication result
      console.error('[SchemeRouter] Failed to record audit entry:', sanitizeError(error));
    }

    return outcome;
  }
}
