/**
 * Unified Configuration Schema
 *
 * Combines the authentication and server sections into the schema of the
 * application's configuration file.
 */

import { z } from 'zod';
import { AuthConfigSchema } from './auth.js';
import { ServerConfigSchema } from './server.js';

export {
  ApiKeyConfigSchema,
  CookieSchemeConfigSchema,
  AuditConfigSchema,
  AuthConfigSchema,
  type ApiKeyConfig,
  type CookieSchemeConfig,
  type AuditConfig,
  type AuthConfig,
} from './auth.js';

export { ServerConfigSchema, type ServerConfig } from './server.js';

export const UnifiedConfigSchema = z.object({
  auth: AuthConfigSchema,
  server: ServerConfigSchema.optional().default({}),
});

export type UnifiedConfig = z.infer<typeof UnifiedConfigSchema>;

/**
 * Raw (pre-default) shape, for building configs in code
 */
export type UnifiedConfigInput = z.input<typeof UnifiedConfigSchema>;
