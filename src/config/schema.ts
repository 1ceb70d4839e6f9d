/**
 * Zod schema for the endpoint and credentials file
 * @module s3v4-rest/config/schema
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { S3RestConfig } from './types.js';

const portSchema = z
  .union([
    z.number(),
    // Overrides replace values verbatim as strings
    z
      .string()
      .regex(/^\d+$/, 'Port must be numeric')
      .transform((value) => Number(value)),
  ])
  .pipe(z.number().int().min(1).max(65535));

/**
 * Zod schema for configuration validation.
 */
export const configSchema = z
  .object({
    version: z.union([z.string(), z.number()]).optional(),
    access_key: z.string().min(1),
    secret_key: z.string().min(1),
    protocol: z.enum(['http', 'https']),
    host: z.string().min(1),
    port: portSchema.optional(),
  })
  .strict();

/**
 * Validates raw configuration data.
 *
 * @throws {ConfigurationError} listing every zod issue
 */
export function parseConfig(raw: unknown): S3RestConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError({
      message: `Invalid configuration: ${issues.join(', ')}`,
      code: 'INVALID_CONFIG',
      details: { issues },
    });
  }
  return result.data;
}
