import type { SecurityError } from '../types/index.js';

export class AuthSecurityError extends Error implements SecurityError {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthSecurityError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthSecurityError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createSecurityError(
  code: string,
  message: string,
  statusCode: number = 500,
  details?: Record<string, unknown>
): AuthSecurityError {
  return new AuthSecurityError(code, message, statusCode, details);
}

// Predefined security error types
export const SecurityErrors = {
  MISCONFIGURED_STRATEGY: (strategy: string, reason: string) =>
    createSecurityError(
      'MISCONFIGURED_STRATEGY',
      `Strategy "${strategy}" is misconfigured: ${reason}`,
      500,
      { strategy }
    ),

  UNAUTHENTICATED: (details?: Record<string, unknown>) =>
    createSecurityError('UNAUTHENTICATED', 'Authentication failed', 401, details),

  UNAUTHORIZED_ROLE: (details?: Record<string, unknown>) =>
    createSecurityError('UNAUTHORIZED_ROLE', 'Access denied', 403, details),

  CONFIGURATION_ERROR: (message: string) =>
    createSecurityError('CONFIGURATION_ERROR', `Configuration error: ${message}`, 500),
} as const;

export function isMisconfiguredStrategy(error: unknown): error is AuthSecurityError {
  return error instanceof AuthSecurityError && error.code === 'MISCONFIGURED_STRATEGY';
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof AuthSecurityError) {
    return {
      type: 'SecurityError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

// HTTP response helper
export function createErrorResponse(error: SecurityError): {
  statusCode: number;
  body: { error: { code: string; message: string; details?: Record<string, unknown> } };
} {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        // Only include details in development
        ...(process.env.NODE_ENV === 'development' && error.details && { details: error.details }),
      },
    },
  };
}
