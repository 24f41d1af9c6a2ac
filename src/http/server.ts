/**
 * Storefront HTTP Server
 *
 * Sample storefront API guarded by the scheme router:
 * - GET    /health             - public
 * - GET    /api/me             - any authenticated caller
 * - GET    /api/products       - any authenticated caller
 * - GET    /api/products/:id   - any authenticated caller
 * - DELETE /api/products/:id   - Administrator only
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import { requireRole } from '../core/authorization-gate.js';
import type { SchemeRouter } from '../core/scheme-router.js';
import { ROLE_ADMINISTRATOR } from '../core/types.js';
import { AuthSecurityError, createErrorResponse, sanitizeError } from '../utils/errors.js';
import type { ProductCatalog } from './catalog.js';
import { createAuthenticationMiddleware, withAuthorization } from './middleware.js';

export interface StorefrontAppOptions {
  router: SchemeRouter;
  catalog: ProductCatalog;

  /** Realm advertised in WWW-Authenticate (default: 'storefront') */
  realm?: string;

  /** API key header advertised in WWW-Authenticate (default: 'X-API-Key') */
  headerName?: string;
}

export function createStorefrontApp(options: StorefrontAppOptions): express.Application {
  const app = express();
  const { catalog } = options;
  const guard = { realm: options.realm, headerName: options.headerName };

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'storefront-auth',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createAuthenticationMiddleware(options.router));

  app.get(
    '/api/me',
    withAuthorization((_req, res, identity) => {
      res.json({ name: identity.name, roles: identity.roles, scheme: identity.scheme });
    }, guard)
  );

  app.get(
    '/api/products',
    withAuthorization((_req, res) => {
      res.json(catalog.list());
    }, guard)
  );

  app.get(
    '/api/products/:id',
    withAuthorization((req, res) => {
      const product = catalog.get(Number(req.params.id));
      if (!product) {
        res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Product not found' } });
        return;
      }
      res.json(product);
    }, guard)
  );

  app.delete(
    '/api/products/:id',
    withAuthorization(
      (req, res, identity) => {
        const id = Number(req.params.id);
        if (!catalog.remove(id)) {
          res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Product not found' } });
          return;
        }
        console.info(`[StorefrontServer] Product ${id} deleted by ${identity.name}`);
        res.status(204).end();
      },
      { ...guard, predicate: requireRole(ROLE_ADMINISTRATOR) }
    )
  );

  // Generic error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[StorefrontServer] Error:', sanitizeError(err));

    if (err instanceof AuthSecurityError) {
      const { statusCode, body } = createErrorResponse(err);
      res.status(statusCode).json(body);
      return;
    }

    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });

  return app;
}

/**
 * @returns The listening HTTP server
 */
export function startHTTPServer(app: express.Application, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, host, () => {
      console.log(`[StorefrontServer] Listening on port ${port}`);
      resolve(server);
    });
  });
}
