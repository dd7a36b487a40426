// Shared TypeScript types

import type { z } from 'zod';
import type { indexConfigSchema, logLevelSchema } from '../schemas';

export type IndexConfig = z.infer<typeof indexConfigSchema>;

export type LogLevel = z.infer<typeof logLevelSchema>;

export type SyncStrategyName = 'git' | 'http';

/**
 * Canonical dotted numeric version, e.g. "1.2.0.3"
 */
export type Version = string;
