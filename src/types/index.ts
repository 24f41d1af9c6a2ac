// Shared types for the storefront authentication layer

export interface SecurityError extends Error {
  code: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

/**
 * Raw HTTP header map as delivered by Node's http module and express.
 */
export type HeaderMap = Record<string, string | string[] | undefined>;
