/**
 * Environment Variable Secret Provider
 *
 * Resolves secrets from process.env. Use as a FALLBACK after
 * FileSecretProvider; environment variables are visible to child processes
 * and end up in crash dumps more easily than mounted files.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Reads env[logicalName], trimmed. Unset or empty → undefined.
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];

    if (value === undefined || value === '') {
      return undefined;
    }

    return value.trim();
  }
}
