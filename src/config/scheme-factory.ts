/**
 * Scheme Factory
 *
 * Builds the process-wide SchemeRegistry from validated configuration.
 * Cookie schemes are registered in config order (= routing priority); the
 * API key strategy is the default.
 */

import { ApiKeyStrategy } from '../core/api-key-strategy.js';
import { ExternalCookieStrategy } from '../core/cookie-strategy.js';
import type { ExternalIdentityProvider } from '../core/cookie-strategy.js';
import type { CredentialStore } from '../core/credential-store.js';
import { JwtCookieProvider } from '../core/jwt-cookie-provider.js';
import { SchemeRegistry } from '../core/scheme-router.js';
import { SecurityErrors } from '../utils/errors.js';
import type { AuthConfig, CookieSchemeConfig } from './schemas/index.js';

export interface SchemeFactoryOptions {
  /** Required when any cookie scheme sets requireKnownSubject */
  credentialStore?: CredentialStore;

  /** Overrides the JWT provider for a named scheme (e.g., a remote OIDC client) */
  providers?: Record<string, ExternalIdentityProvider>;
}

export function buildSchemeRegistry(
  config: AuthConfig,
  options: SchemeFactoryOptions = {}
): SchemeRegistry {
  const builder = SchemeRegistry.builder();

  for (const scheme of config.cookieSchemes) {
    const provider = options.providers?.[scheme.name] ?? createJwtProvider(scheme, options);
    builder.register(
      scheme.cookieName,
      new ExternalCookieStrategy({ name: scheme.name, cookieName: scheme.cookieName, provider })
    );
  }

  builder.setDefault(
    new ApiKeyStrategy({
      expectedKey: config.apiKey.expectedKey,
      headerName: config.apiKey.headerName,
      subjectName: config.apiKey.subjectName,
      roles: config.apiKey.roles,
    })
  );

  const registry = builder.build();
  console.log('[SchemeFactory] Registered schemes:', {
    cookieSchemes: registry.schemes().map((r) => `${r.strategy.name} (${r.marker})`),
    default: registry.defaultStrategy.name,
  });
  return registry;
}

function createJwtProvider(
  scheme: CookieSchemeConfig,
  options: SchemeFactoryOptions
): ExternalIdentityProvider {
  if (scheme.requireKnownSubject && !options.credentialStore) {
    throw SecurityErrors.MISCONFIGURED_STRATEGY(
      scheme.name,
      'requireKnownSubject is set but no credential store was provided'
    );
  }

  return new JwtCookieProvider({
    secret: scheme.secret,
    issuer: scheme.issuer,
    audience: scheme.audience,
    nameClaim: scheme.nameClaim,
    rolesClaim: scheme.rolesClaim,
    clockTolerance: scheme.clockTolerance,
    credentialStore: scheme.requireKnownSubject ? options.credentialStore : undefined,
  });
}
