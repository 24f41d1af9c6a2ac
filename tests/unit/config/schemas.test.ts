/**
 * Configuration Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ApiKeyConfigSchema,
  AuthConfigSchema,
  ServerConfigSchema,
  CookieSchemeConfigSchema,
  UnifiedConfigSchema,
} from '../../../src/config/schemas/index.js';

describe('ApiKeyConfigSchema', () => {
  it('should default header, subject and roles', () => {
    expect(ApiKeyConfigSchema.parse({ expectedKey: 'secret123' })).toEqual({
      headerName: 'X-API-Key',
      expectedKey: 'secret123',
      subjectName: 'API User',
      roles: [],
    });
  });

  it('should keep the key exactly as configured', () => {
    expect(ApiKeyConfigSchema.parse({ expectedKey: ' secret123 ' }).expectedKey).toBe(' secret123 ');
  });

  it.each([
    ['missing', {}],
    ['empty', { expectedKey: '' }],
    ['blank', { expectedKey: '\t ' }],
  ])('should reject a %s key', (_label, input) => {
    const result = ApiKeyConfigSchema.safeParse(input);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(['expectedKey']);
  });

  it('should reject an empty header name', () => {
    expect(ApiKeyConfigSchema.safeParse({ expectedKey: 'secret123', headerName: '' }).success).toBe(false);
  });
});

describe('CookieSchemeConfigSchema', () => {
  const scheme = {
    name: 'Cookies',
    cookieName: 'storefront.session',
    issuer: 'storefront',
    audience: 'storefront',
    secret: 'test-secret-0123456789',
  };

  it('should apply claim and tolerance defaults', () => {
    expect(CookieSchemeConfigSchema.parse(scheme)).toEqual({
      ...scheme,
      nameClaim: 'name',
      rolesClaim: 'roles',
      clockTolerance: 30,
      requireKnownSubject: false,
    });
  });

  it('should reject signing secrets shorter than 16 characters', () => {
    expect(CookieSchemeConfigSchema.safeParse({ ...scheme, secret: 'test-secret' }).success).toBe(false);
  });
});

describe('AuthConfigSchema', () => {
  it('should default cookie schemes and audit', () => {
    const config = AuthConfigSchema.parse({ apiKey: { expectedKey: 'secret123' } });

    expect(config.cookieSchemes).toEqual([]);
    expect(config.audit).toEqual({ enabled: false, maxEntries: 10000 });
  });
});

describe('UnifiedConfigSchema', () => {
  it('should default the server section', () => {
    const config = UnifiedConfigSchema.parse({ auth: { apiKey: { expectedKey: 'secret123' } } });

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', realm: 'storefront' });
  });
});

describe('ServerConfigSchema', () => {
  it('should accept a plain realm', () => {
    expect(ServerConfigSchema.parse({ realm: 'storefront admin' }).realm).toBe('storefront admin');
  });

  it.each(['store"front', 'store\\front', ''])('should reject the realm %j', (realm) => {
    expect(ServerConfigSchema.safeParse({ realm }).success).toBe(false);
  });
});
