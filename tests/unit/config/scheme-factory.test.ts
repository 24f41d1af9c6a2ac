/**
 * Scheme Factory Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SignJWT } from 'jose';
import { buildSchemeRegistry } from '../../../src/config/scheme-factory.js';
import { AuthConfigSchema } from '../../../src/config/schemas/index.js';
import { ApiKeyStrategy } from '../../../src/core/api-key-strategy.js';
import { ExternalCookieStrategy } from '../../../src/core/cookie-strategy.js';
import { InMemoryCredentialStore } from '../../../src/core/credential-store.js';
import { SchemeRouter } from '../../../src/core/scheme-router.js';

const OIDC_SECRET = 'test-oidc-secret-0123456789';
const SESSION_SECRET = 'test-session-secret-012345';

const authConfig = (overrides: Record<string, unknown> = {}) =>
  AuthConfigSchema.parse({
    apiKey: { expectedKey: 'secret123' },
    cookieSchemes: [
      {
        name: 'OpenIdConnect',
        cookieName: 'storefront.oidc',
        issuer: 'https://login.example.test',
        audience: 'storefront',
        secret: OIDC_SECRET,
      },
      {
        name: 'Cookies',
        cookieName: 'storefront.session',
        issuer: 'storefront',
        audience: 'storefront',
        secret: SESSION_SECRET,
        ...overrides,
      },
    ],
  });

async function sessionCookie(subject: string, name: string): Promise<string> {
  return new SignJWT({ name })
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuer('storefront')
    .setAudience('storefront')
    .setSubject(subject)
    .setExpirationTime('5m')
    .sign(new TextEncoder().encode(SESSION_SECRET));
}

describe('buildSchemeRegistry()', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register cookie schemes in config order with the API key as default', () => {
    const registry = buildSchemeRegistry(authConfig());

    expect(registry.schemes().map((r) => [r.marker, r.strategy.name])).toEqual([
      ['storefront.oidc', 'OpenIdConnect'],
      ['storefront.session', 'Cookies'],
    ]);
    expect(registry.schemes()[0].strategy).toBeInstanceOf(ExternalCookieStrategy);
    expect(registry.defaultStrategy).toBeInstanceOf(ApiKeyStrategy);
  });

  it('should authenticate a session cookie end to end', async () => {
    const router = new SchemeRouter(buildSchemeRegistry(authConfig()));

    const outcome = await router.authenticate({
      headers: {},
      cookies: { 'storefront.session': await sessionCookie('user-1', 'alice') },
    });

    expect(outcome).toEqual({
      status: 'success',
      identity: { name: 'alice', roles: [], claims: { name: 'alice', sub: 'user-1' }, scheme: 'Cookies' },
    });
  });

  it('should use a provider override for a named scheme', async () => {
    const verify = vi.fn().mockResolvedValue({
      verified: true,
      identity: { name: 'federated-user', roles: [], claims: {} },
    });
    const router = new SchemeRouter(
      buildSchemeRegistry(authConfig(), { providers: { OpenIdConnect: { verify } } })
    );

    const outcome = await router.authenticate({ headers: {}, cookies: { 'storefront.oidc': 'opaque' } });

    expect(verify).toHaveBeenCalledWith('opaque');
    expect(outcome.status === 'success' && outcome.identity.scheme).toBe('OpenIdConnect');
  });

  it('should require a credential store when requireKnownSubject is set', () => {
    expect(() => buildSchemeRegistry(authConfig({ requireKnownSubject: true }))).toThrow(
      'Strategy "Cookies" is misconfigured: requireKnownSubject is set but no credential store was provided'
    );
  });

  it('should consult the credential store when requireKnownSubject is set', async () => {
    const store = new InMemoryCredentialStore([
      { subject: 'user-1', roles: ['Administrator'], claims: {} },
    ]);
    const router = new SchemeRouter(
      buildSchemeRegistry(authConfig({ requireKnownSubject: true }), { credentialStore: store })
    );

    const known = await router.authenticate({
      headers: {},
      cookies: { 'storefront.session': await sessionCookie('user-1', 'alice') },
    });
    const unknown = await router.authenticate({
      headers: {},
      cookies: { 'storefront.session': await sessionCookie('user-2', 'bob') },
    });

    expect(known.status === 'success' && known.identity.roles).toEqual(['Administrator']);
    expect(unknown).toEqual({ status: 'failure', reason: 'InvalidCredential', scheme: 'Cookies' });
  });
});
