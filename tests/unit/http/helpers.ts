/**
 * Shared fixtures for HTTP tests: an API key default plus one cookie scheme
 * backed by a stub provider that maps cookie values to identities.
 */

import { ApiKeyStrategy } from '../../../src/core/api-key-strategy.js';
import { ExternalCookieStrategy } from '../../../src/core/cookie-strategy.js';
import type { ExternalIdentityProvider, ExternalVerification } from '../../../src/core/cookie-strategy.js';
import { SchemeRegistry, SchemeRouter } from '../../../src/core/scheme-router.js';
import { ROLE_ADMINISTRATOR, ROLE_CUSTOMER } from '../../../src/core/types.js';
import { ProductCatalog } from '../../../src/http/catalog.js';
import type { Product } from '../../../src/http/catalog.js';

export const SESSION_COOKIE = 'storefront.session';

export const PRODUCTS: Product[] = [
  { id: 1, name: 'Trail Backpack', price: 89.5, category: 'Outdoor' },
  { id: 2, name: 'Ceramic Mug', price: 12, category: 'Kitchen' },
];

export class StubSessionProvider implements ExternalIdentityProvider {
  async verify(cookieValue: string): Promise<ExternalVerification> {
    switch (cookieValue) {
      case 'admin-session':
        return { verified: true, identity: { name: 'alice', roles: [ROLE_ADMINISTRATOR], claims: {} } };
      case 'customer-session':
        return { verified: true, identity: { name: 'bob', roles: [ROLE_CUSTOMER], claims: {} } };
      default:
        return { verified: false, reason: 'unknown session' };
    }
  }
}

export function createTestRouter(): SchemeRouter {
  const registry = SchemeRegistry.builder()
    .register(
      SESSION_COOKIE,
      new ExternalCookieStrategy({
        name: 'Cookies',
        cookieName: SESSION_COOKIE,
        provider: new StubSessionProvider(),
      })
    )
    .setDefault(new ApiKeyStrategy({ expectedKey: 'secret123' }))
    .build();

  return new SchemeRouter(registry);
}

export function createTestCatalog(): ProductCatalog {
  return new ProductCatalog(PRODUCTS);
}
