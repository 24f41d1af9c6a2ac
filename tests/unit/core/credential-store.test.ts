/**
 * InMemoryCredentialStore Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryCredentialStore } from '../../../src/core/credential-store.js';

describe('InMemoryCredentialStore', () => {
  it('should start empty', async () => {
    const store = new InMemoryCredentialStore();

    expect(store.size()).toBe(0);
    expect(await store.lookup('anyone')).toBeUndefined();
  });

  it('should look up principals by subject', async () => {
    const store = new InMemoryCredentialStore([
      { subject: 'user-1', roles: ['Customer'], claims: { tier: 'silver' } },
    ]);

    expect(await store.lookup('user-1')).toEqual({
      subject: 'user-1',
      roles: ['Customer'],
      claims: { tier: 'silver' },
    });
  });

  it('should reject duplicate subjects', () => {
    expect(
      () =>
        new InMemoryCredentialStore([
          { subject: 'user-1', roles: [], claims: {} },
          { subject: 'user-1', roles: ['Administrator'], claims: {} },
        ])
    ).toThrow('Duplicate principal in credential store: user-1');
  });

  it('should not be mutable through returned principals', async () => {
    const store = new InMemoryCredentialStore([{ subject: 'user-1', roles: ['Customer'], claims: {} }]);

    const first = await store.lookup('user-1');
    first?.roles.push('Administrator');

    expect((await store.lookup('user-1'))?.roles).toEqual(['Customer']);
  });

  it('should not be mutable through the constructor input', async () => {
    const principals = [{ subject: 'user-1', roles: ['Customer'], claims: {} }];
    const store = new InMemoryCredentialStore(principals);

    principals[0].roles.push('Administrator');

    expect((await store.lookup('user-1'))?.roles).toEqual(['Customer']);
  });
});
