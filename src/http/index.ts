export {
  createAuthenticationMiddleware,
  withAuthorization,
  getAuthOutcome,
  type AuthorizationOptions,
  type AuthorizedHandler,
} from './middleware.js';
export { createStorefrontApp, startHTTPServer, type StorefrontAppOptions } from './server.js';
export { ProductCatalog, ProductSchema, loadProducts, type Product } from './catalog.js';
