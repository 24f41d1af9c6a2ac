#!/usr/bin/env node
import type { Server } from 'http';
import { AuditService } from './core/audit-service.js';
import { SchemeRouter } from './core/scheme-router.js';
import { ConfigManager } from './config/manager.js';
import { buildSchemeRegistry } from './config/scheme-factory.js';
import { ProductCatalog, loadProducts } from './http/catalog.js';
import { createStorefrontApp, startHTTPServer } from './http/server.js';
import { sanitizeError } from './utils/errors.js';

/**
 * Start the storefront API.
 *
 * Startup aborts (exit code 1) on any configuration error, including an
 * unset API key; no request is served with a misconfigured strategy.
 */
async function main(): Promise<void> {
  const configPath = process.env.CONFIG_PATH;
  const productsPath = process.env.PRODUCTS_PATH || './config/products.json';

  console.log('Starting storefront API...');
  console.log(`Config: ${configPath || 'default'}`);

  let server: Server;
  try {
    const bootstrapAudit = new AuditService();
    const configManager = new ConfigManager({
      auditService: bootstrapAudit,
      secretsDir: process.env.SECRETS_DIR,
    });
    const config = await configManager.loadConfig(configPath);

    const auditService = new AuditService({
      enabled: config.auth.audit.enabled,
      maxEntries: config.auth.audit.maxEntries,
    });
    const router = new SchemeRouter(buildSchemeRegistry(config.auth), auditService);
    const catalog = new ProductCatalog(await loadProducts(productsPath));

    const app = createStorefrontApp({
      router,
      catalog,
      realm: config.server.realm,
      headerName: config.auth.apiKey.headerName,
    });
    server = await startHTTPServer(app, config.server.port, config.server.host);

    console.log(`\n✓ Server is listening on http://localhost:${config.server.port}`);
    console.log(`Authentication: ${config.auth.apiKey.headerName} header or scheme cookie required under /api`);
  } catch (error) {
    console.error('Failed to start server:', sanitizeError(error));
    process.exit(1);
  }

  const shutdown = () => {
    console.log('\n\nShutting down server...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', sanitizeError(error));
  process.exit(1);
});
