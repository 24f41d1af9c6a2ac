/**
 * Secret Resolver
 *
 * Walks a parsed configuration object and replaces {"$secret": "NAME"}
 * descriptors with values from a provider chain.
 *
 * Features:
 * - Provider chain with priority ordering
 * - Recursive config walking
 * - Fail-fast behavior (startup aborts if a secret cannot be resolved)
 * - Optional audit logging integration
 *
 * Usage:
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const config = JSON.parse(await fs.readFile('storefront-auth.json', 'utf-8'));
 * await resolver.resolveSecrets(config);
 * // Config now has secrets resolved in-place
 * ```
 */

import type { ISecretProvider } from './ISecretProvider.js';
import { isSecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Optional audit service for logging secret access */
  auditService?: AuditService;

  /** Whether to fail fast if secrets cannot be resolved (default: true) */
  failFast?: boolean;
}

type SecretDescriptor = { $secret: string };

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private auditService?: AuditService;
  private failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Providers are tried in the order they are added; the first to return a
   * value wins.
   *
   * @throws Error if provider doesn't implement ISecretProvider
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve all descriptors in place.
   *
   * @throws Error if failFast is true and a secret cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config);
  }

  private async resolveNode(node: unknown, path: string = 'config'): Promise<void> {
    if (typeof node !== 'object' || node === null) {
      return;
    }

    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const child: unknown = node[i];
        if (this.isSecretDescriptor(child)) {
          const resolved = await this.resolveDescriptor(child, `${path}[${i}]`);
          if (resolved !== undefined) {
            node[i] = resolved;
          }
        } else {
          await this.resolveNode(child, `${path}[${i}]`);
        }
      }
      return;
    }

    for (const [key, child] of Object.entries(node)) {
      const childPath = `${path}.${key}`;

      if (this.isSecretDescriptor(child)) {
        const resolved = await this.resolveDescriptor(child, childPath);
        if (resolved !== undefined) {
          Reflect.set(node, key, resolved);
        }
      } else {
        await this.resolveNode(child, childPath);
      }
    }
  }

  private async resolveDescriptor(
    descriptor: SecretDescriptor,
    path: string
  ): Promise<string | undefined> {
    const logicalName = descriptor.$secret;
    const resolvedValue = await this.resolveSecret(logicalName, path);

    if (resolvedValue === undefined) {
      const errorMessage = `Secret "${logicalName}" at path "${path}" could not be resolved by any provider.`;

      if (this.failFast) {
        throw new Error(`[SecretResolver] ${errorMessage}`);
      }
      console.warn(`[SecretResolver] ${errorMessage}`);
    }

    return resolvedValue;
  }

  /**
   * A secret descriptor is an object with a single "$secret" string property.
   */
  private isSecretDescriptor(obj: unknown): obj is SecretDescriptor {
    return (
      typeof obj === 'object' &&
      obj !== null &&
      !Array.isArray(obj) &&
      '$secret' in obj &&
      typeof obj.$secret === 'string' &&
      obj.$secret.length > 0 &&
      Object.keys(obj).length === 1
    );
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          await this.auditService?.log({
            source: 'secret:resolution',
            timestamp: new Date(),
            userId: 'system',
            action: `resolve:${logicalName}`,
            success: true,
            metadata: {
              secretName: logicalName,
              provider: provider.constructor.name,
              configPath: path,
            },
          });

          return value;
        }
      } catch (error) {
        // Provider failure is not fatal; the next provider gets a chance
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    await this.auditService?.log({
      source: 'secret:resolution',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      metadata: {
        secretName: logicalName,
        provider: 'none',
        configPath: path,
        error: 'No provider could resolve this secret',
      },
    });

    return undefined;
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  public clearProviders(): void {
    this.providers = [];
  }
}
