// Zod schemas for validation

import { z } from 'zod';
import { DEFAULT_GIT_URL, DEFAULT_HTTP_URL } from '../constants';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Environment values arrive as strings
const booleanFlagSchema = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .optional()
  .transform((value) => value === true || value === 'true' || value === '1');

export const indexConfigSchema = z.object({
  gitUrl: z.string().min(1, 'Git URL is required').default(DEFAULT_GIT_URL),
  httpUrl: z.string().url('Invalid index download URL').default(DEFAULT_HTTP_URL),
  storageRoot: z.string().min(1, 'Storage root is required'),
  indexDir: z.string().min(1, 'Index directory is required'),
  verifySignatures: booleanFlagSchema,
  requestTimeoutMs: z.coerce.number().int().positive().default(300_000),
  commandTimeoutMs: z.coerce.number().int().positive().default(600_000),
  httpRetries: z.coerce.number().int().min(0).max(10, 'At most 10 retries are allowed').default(3),
  logLevel: logLevelSchema.default('info'),
});

export const packageNameSchema = z
  .string()
  .min(1, 'Package name is required')
  .refine((name) => !name.includes('/'), 'Package name must not contain "/"');

const VERSION_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Dotted numeric version; the output is canonical (no leading zeros)
 */
export const versionSchema = z
  .string()
  .regex(VERSION_PATTERN, 'Invalid version')
  .transform((raw) =>
    raw
      .split('.')
      .map((component) => component.replace(/^0+(?=\d)/, ''))
      .join('.')
  );
