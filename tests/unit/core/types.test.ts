/**
 * Outcome Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { FAILURE_REASONS, fail, isSuccess, succeed } from '../../../src/core/types.js';

describe('outcome helpers', () => {
  it('succeed() should refuse an identity without a subject name', () => {
    expect(() => succeed({ name: ' ', roles: [], claims: {}, scheme: 'ApiKey' })).toThrow(
      'Scheme "ApiKey" produced an identity without a subject name'
    );
  });

  it('succeed() should copy roles and claims', () => {
    const roles = ['Customer'];
    const claims = { tier: 'gold' };

    const outcome = succeed({ name: 'alice', roles, claims, scheme: 'Cookies' });
    roles.push('Administrator');
    claims.tier = 'bronze';

    expect(outcome.identity).toEqual({
      name: 'alice',
      roles: ['Customer'],
      claims: { tier: 'gold' },
      scheme: 'Cookies',
    });
  });

  it('isSuccess() should narrow outcomes', () => {
    expect(isSuccess(succeed({ name: 'alice', roles: [], claims: {}, scheme: 'Cookies' }))).toBe(true);
    expect(isSuccess(fail('Cookies', 'MissingCredential'))).toBe(false);
  });

  it.each(FAILURE_REASONS)('fail() should carry the %s reason and scheme', (reason) => {
    expect(fail('ApiKey', reason)).toEqual({ status: 'failure', reason, scheme: 'ApiKey' });
  });

  it('FAILURE_REASONS should list every failure kind once', () => {
    expect([...FAILURE_REASONS].sort()).toEqual(['EmptyCredential', 'InvalidCredential', 'MissingCredential']);
  });
});
