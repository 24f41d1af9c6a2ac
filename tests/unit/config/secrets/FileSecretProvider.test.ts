/**
 * Unit Tests for FileSecretProvider
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSecretProvider } from '../../../../src/config/secrets/providers/FileSecretProvider.js';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('FileSecretProvider', () => {
  let tempDir: string;
  let provider: FileSecretProvider;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'storefront-secrets-'));
    provider = new FileSecretProvider(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should default to /run/secrets', () => {
    expect(new FileSecretProvider().getSecretDir()).toBe('/run/secrets');
  });

  it('should read and trim a secret file', async () => {
    await fs.writeFile(path.join(tempDir, 'STOREFRONT_API_KEY'), 'secret123\n');

    expect(await provider.resolve('STOREFRONT_API_KEY')).toBe('secret123');
  });

  it('should return undefined for a missing file', async () => {
    expect(await provider.resolve('MISSING')).toBeUndefined();
  });

  it.each(['../outside', '/etc/passwd', 'nested/../../outside'])(
    'should reject the traversal attempt %s',
    async (name) => {
      expect(await provider.resolve(name)).toBeUndefined();
    }
  );
});
