/**
 * Authentication Configuration Schema
 *
 * Configures the static API key strategy, the cookie schemes routed ahead of
 * it, and the audit trail.
 */

import { z } from 'zod';

// ============================================================================
// API Key Scheme
// ============================================================================

/**
 * Static API key configuration
 *
 * SECURITY: expectedKey has no default. A blank key is a misconfiguration and
 * aborts startup.
 */
export const ApiKeyConfigSchema = z.object({
  headerName: z
    .string()
    .min(1)
    .optional()
    .default('X-API-Key')
    .describe('Request header carrying the API key'),
  expectedKey: z
    .string()
    .refine((key) => key.trim().length > 0, { message: 'expectedKey must not be blank' })
    .describe('Pre-shared key callers must present'),
  subjectName: z
    .string()
    .min(1)
    .optional()
    .default('API User')
    .describe('Subject name assigned to API key callers'),
  roles: z.array(z.string().min(1)).optional().default([]).describe('Roles granted to key holders'),
});

// ============================================================================
// Cookie Schemes
// ============================================================================

/**
 * One cookie-marked scheme. The array order in config is the routing priority.
 */
export const CookieSchemeConfigSchema = z.object({
  name: z.string().min(1).describe('Scheme name (e.g., "Cookies", "OpenIdConnect")'),
  cookieName: z.string().min(1).describe('Marker cookie holding the signed session'),
  issuer: z.string().min(1).describe('Expected iss claim'),
  audience: z.string().min(1).describe('Expected aud claim'),
  secret: z.string().min(16).describe('HS256 signing secret shared with the identity provider'),
  nameClaim: z.string().min(1).optional().default('name'),
  rolesClaim: z.string().min(1).optional().default('roles'),
  clockTolerance: z.number().int().min(0).max(300).optional().default(30),
  requireKnownSubject: z
    .boolean()
    .optional()
    .default(false)
    .describe('Reject subjects missing from the credential store'),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().optional().default(false).describe('Enable audit logging'),
  maxEntries: z.number().int().min(1).max(1000000).optional().default(10000),
});

export const AuthConfigSchema = z
  .object({
    apiKey: ApiKeyConfigSchema,
    cookieSchemes: z.array(CookieSchemeConfigSchema).optional().default([]),
    audit: AuditConfigSchema.optional().default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.cookieSchemes.forEach((scheme, index) => {
      if (seen.has(scheme.cookieName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cookieSchemes', index, 'cookieName'],
          message: `Duplicate scheme marker cookie: ${scheme.cookieName}`,
        });
      }
      seen.add(scheme.cookieName);
    });
  });

export type ApiKeyConfig = z.infer<typeof ApiKeyConfigSchema>;
export type CookieSchemeConfig = z.infer<typeof CookieSchemeConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
