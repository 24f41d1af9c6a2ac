/**
 * Security Error Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AuthSecurityError,
  SecurityErrors,
  createErrorResponse,
  isMisconfiguredStrategy,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('SecurityErrors', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('MISCONFIGURED_STRATEGY should name the strategy and reason', () => {
    const error = SecurityErrors.MISCONFIGURED_STRATEGY('ApiKey', 'expected API key is not set');

    expect(error).toBeInstanceOf(AuthSecurityError);
    expect(error.toJSON()).toEqual({
      name: 'AuthSecurityError',
      code: 'MISCONFIGURED_STRATEGY',
      message: 'Strategy "ApiKey" is misconfigured: expected API key is not set',
      statusCode: 500,
      details: { strategy: 'ApiKey' },
    });
    expect(isMisconfiguredStrategy(error)).toBe(true);
  });

  it('isMisconfiguredStrategy should reject other errors', () => {
    expect(isMisconfiguredStrategy(SecurityErrors.CONFIGURATION_ERROR('bad port'))).toBe(false);
    expect(isMisconfiguredStrategy(new Error('Strategy misconfigured'))).toBe(false);
  });

  it('createErrorResponse should produce the generic 401 body', () => {
    expect(createErrorResponse(SecurityErrors.UNAUTHENTICATED({ reason: 'InvalidCredential' }))).toEqual({
      statusCode: 401,
      body: { error: { code: 'UNAUTHENTICATED', message: 'Authentication failed' } },
    });
  });

  it('createErrorResponse should include details only in development', () => {
    vi.stubEnv('NODE_ENV', 'development');

    expect(createErrorResponse(SecurityErrors.UNAUTHORIZED_ROLE({ required: 'Administrator' })).body).toEqual({
      error: { code: 'UNAUTHORIZED_ROLE', message: 'Access denied', details: { required: 'Administrator' } },
    });
  });

  it('sanitizeError should drop details in production', () => {
    vi.stubEnv('NODE_ENV', 'production');

    expect(sanitizeError(SecurityErrors.MISCONFIGURED_STRATEGY('ApiKey', 'header name is empty'))).toEqual({
      type: 'SecurityError',
      code: 'MISCONFIGURED_STRATEGY',
      message: 'Strategy "ApiKey" is misconfigured: header name is empty',
      statusCode: 500,
    });
  });

  it('sanitizeError should describe plain and unknown errors', () => {
    vi.stubEnv('NODE_ENV', 'production');

    expect(sanitizeError(new TypeError('boom'))).toEqual({ type: 'Error', message: 'boom', name: 'TypeError' });
    expect(sanitizeError('boom')).toEqual({ type: 'Unknown', message: 'An unknown error occurred' });
  });
});
