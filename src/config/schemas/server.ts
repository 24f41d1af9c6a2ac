/**
 * HTTP Server Configuration Schema
 */

import { z } from 'zod';

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).optional().default(3000),
  host: z.string().min(1).optional().default('0.0.0.0'),
  realm: z
    .string()
    .regex(/^[^"\\]+$/, 'realm must not contain quotes or backslashes')
    .optional()
    .default('storefront')
    .describe('Realm advertised in WWW-Authenticate'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
