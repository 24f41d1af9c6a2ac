/**
 * Configuration Module - Public API
 */

export { ConfigManager, type ConfigManagerOptions } from './manager.js';
export { buildSchemeRegistry, type SchemeFactoryOptions } from './scheme-factory.js';

export {
  UnifiedConfigSchema,
  AuthConfigSchema,
  ApiKeyConfigSchema,
  CookieSchemeConfigSchema,
  AuditConfigSchema,
  ServerConfigSchema,
  type UnifiedConfig,
  type UnifiedConfigInput,
  type AuthConfig,
  type ApiKeyConfig,
  type CookieSchemeConfig,
  type AuditConfig,
  type ServerConfig,
} from './schemas/index.js';

export * from './secrets/index.js';
