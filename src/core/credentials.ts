/**
 * Credential Extraction
 *
 * Pure lookups over a request's header and cookie maps. No side effects.
 */

import { parse as parseCookie } from 'cookie';
import type { HeaderMap } from '../types/index.js';
import type { FailureReason, RequestCredentials } from './types.js';

export type ExtractionResult =
  | { ok: true; value: string }
  | { ok: false; reason: Extract<FailureReason, 'MissingCredential' | 'EmptyCredential'> };

/**
 * Case-insensitive header lookup.
 *
 * Multi-valued headers yield their first value.
 */
export function getHeader(credentials: RequestCredentials, name: string): string | undefined {
  const wanted = name.toLowerCase();

  for (const [key, value] of Object.entries(credentials.headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }
    return Array.isArray(value) ? value[0] : value;
  }

  return undefined;
}

export function getCookie(credentials: RequestCredentials, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(credentials.cookies, name)
    ? credentials.cookies[name]
    : undefined;
}

/**
 * Locate the credential carried in a named header.
 *
 * @example
 * X-API-Key: secret123   → { ok: true, value: 'secret123' }
 * (no header)            → { ok: false, reason: 'MissingCredential' }
 * X-API-Key:             → { ok: false, reason: 'EmptyCredential' }
 */
export function extractHeaderCredential(
  credentials: RequestCredentials,
  headerName: string
): ExtractionResult {
  const value = getHeader(credentials, headerName);

  if (value === undefined) {
    return { ok: false, reason: 'MissingCredential' };
  }

  if (value.trim().length === 0) {
    return { ok: false, reason: 'EmptyCredential' };
  }

  return { ok: true, value };
}

/**
 * Same contract as extractHeaderCredential, over a named cookie.
 */
export function extractCookieCredential(
  credentials: RequestCredentials,
  cookieName: string
): ExtractionResult {
  const value = getCookie(credentials, cookieName);

  if (value === undefined) {
    return { ok: false, reason: 'MissingCredential' };
  }

  if (value.trim().length === 0) {
    return { ok: false, reason: 'EmptyCredential' };
  }

  return { ok: true, value };
}

export function parseCookieHeader(header: string | undefined): Record<string, string> {
  if (!header) {
    return {};
  }

  const cookies: Record<string, string> = {};
  for (const [name, value] of Object.entries(parseCookie(header))) {
    if (value !== undefined) {
      cookies[name] = value;
    }
  }
  return cookies;
}

/**
 * Build the credential source for a request from its raw header map.
 */
export function credentialsFromHeaders(headers: HeaderMap): RequestCredentials {
  const credentials: RequestCredentials = { headers, cookies: {} };
  credentials.cookies = parseCookieHeader(getHeader(credentials, 'cookie'));
  return credentials;
}
