/**
 * File-Based Secret Provider
 *
 * Resolves secrets from files on the filesystem (Docker/Kubernetes secret
 * mounts). This is the recommended provider for production.
 *
 * Usage:
 * ```typescript
 * const provider = new FileSecretProvider('/run/secrets');
 * const key = await provider.resolve('STOREFRONT_API_KEY');
 * // Reads from /run/secrets/STOREFRONT_API_KEY
 * ```
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  /**
   * Reads `{secretDir}/{logicalName}` (trimmed).
   *
   * Names containing '..' or starting with '/' are rejected, as is any path
   * that resolves outside secretDir.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || logicalName.startsWith('/')) {
      return undefined;
    }

    const filePath = path.join(this.secretDir, logicalName);
    const normalizedSecretDir = path.resolve(this.secretDir);
    const normalizedFilePath = path.resolve(filePath);

    if (!normalizedFilePath.startsWith(normalizedSecretDir + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = await fs.readFile(filePath, 'utf-8');

      // Files often have trailing newlines from echo/heredoc
      return secretValue.trim();
    } catch (error: unknown) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code === 'ENOENT' || code === 'EACCES') {
        return undefined;
      }

      console.warn(
        `[FileSecretProvider] Unexpected error reading ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
