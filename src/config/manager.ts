import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { UnifiedConfigSchema, type UnifiedConfig, type AuthConfig, type ServerConfig } from './schemas/index.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { ISecretProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';
import { SecurityErrors } from '../utils/errors.js';

export interface ConfigManagerOptions {
  /** AuditService instance for logging secret access (optional) */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Replaces the default File → Env provider chain */
  providers?: ISecretProvider[];
}

export class ConfigManager {
  private config: UnifiedConfig | null = null;
  private env: NodeJS.ProcessEnv;
  private secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options?.auditService,
      failFast: true,
    });

    const providers = options?.providers ?? [
      // 1. Mounted files (production)
      new FileSecretProvider(options?.secretsDir ?? '/run/secrets'),
      // 2. Environment (development/test)
      new EnvProvider(this.env),
    ];
    for (const provider of providers) {
      this.secretResolver.addProvider(provider);
    }
  }

  /**
   * Load, resolve and validate the configuration file.
   *
   * @throws {AuthSecurityError} MISCONFIGURED_STRATEGY if the API key is unset or blank
   * @throws {AuthSecurityError} CONFIGURATION_ERROR for any other invalid or unreadable config
   */
  async loadConfig(configPath?: string): Promise<UnifiedConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.CONFIG_PATH || './config/storefront-auth.json';

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(
        `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    return this.loadFromObject(rawConfig);
  }

  /**
   * Resolve secrets in and validate an already-parsed configuration object.
   */
  async loadFromObject(rawConfig: unknown): Promise<UnifiedConfig> {
    // Secrets are resolved BEFORE validation so {"$secret": "NAME"} can stand
    // in for any string value
    console.log('[ConfigManager] Resolving secrets...');
    try {
      await this.secretResolver.resolveSecrets(rawConfig);
    } catch (error) {
      throw SecurityErrors.CONFIGURATION_ERROR(error instanceof Error ? error.message : String(error));
    }

    const parsed = UnifiedConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
      throw this.toStartupError(parsed.error);
    }

    this.validateSecurityRequirements(parsed.data);
    this.config = parsed.data;

    console.log('[ConfigManager] Configuration loaded and validated successfully');
    return this.config;
  }

  getConfig(): UnifiedConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getAuthConfig(): AuthConfig {
    return this.getConfig().auth;
  }

  getServerConfig(): ServerConfig {
    return this.getConfig().server;
  }

  getEnvironment(): NodeJS.ProcessEnv {
    return this.env;
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  /**
   * An unset or blank API key is reported as a misconfigured strategy rather
   * than a generic schema error.
   */
  private toStartupError(error: ZodError) {
    const apiKeyIssue = error.issues.find(
      (issue) =>
        issue.path[0] === 'auth' &&
        (issue.path.length === 1 ||
          (issue.path[1] === 'apiKey' && (issue.path.length === 2 || issue.path[2] === 'expectedKey')))
    );

    if (apiKeyIssue) {
      return SecurityErrors.MISCONFIGURED_STRATEGY('ApiKey', 'expected API key is not set');
    }

    const summary = error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return SecurityErrors.CONFIGURATION_ERROR(summary);
  }

  private validateSecurityRequirements(config: UnifiedConfig): void {
    const { apiKey, cookieSchemes } = config.auth;

    if (this.isSecureEnvironment() && apiKey.expectedKey.length < 16) {
      console.warn('[ConfigManager] API key is shorter than 16 characters - use a longer key in production');
    }

    for (const scheme of cookieSchemes) {
      if (scheme.secret === apiKey.expectedKey) {
        throw SecurityErrors.CONFIGURATION_ERROR(
          `cookie scheme ${scheme.name} must not reuse the API key as its signing secret`
        );
      }
    }
  }
}
