/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { homedir } from 'node:os';
import path from 'node:path';
import { indexConfigSchema, type IndexConfig } from '@pkgindex/shared';
import { InvalidConfigError } from './errors';

export type ConfigEnv = Record<string, string | undefined>;

export type ConfigInput = Partial<Record<keyof IndexConfig, unknown>>;

/**
 * Validate a configuration object, filling in defaults
 */
export function parseConfig(input: ConfigInput): IndexConfig {
  const result = indexConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(
      'Invalid package index configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Build the configuration from environment variables.
 * Entry points load `.env` with dotenv before calling this.
 */
export function loadConfig(env: ConfigEnv = process.env): IndexConfig {
  const storageRoot = path.resolve(env.PKGINDEX_ROOT || path.join(homedir(), '.pkgindex'));
  const indexDir = path.resolve(env.PKGINDEX_INDEX_DIR || path.join(storageRoot, 'indices', 'hackage'));

  return parseConfig({
    gitUrl: env.PKGINDEX_GIT_URL || undefined,
    httpUrl: env.PKGINDEX_HTTP_URL || undefined,
    storageRoot,
    indexDir,
    verifySignatures: env.PKGINDEX_VERIFY_SIGNATURES || undefined,
    requestTimeoutMs: env.PKGINDEX_REQUEST_TIMEOUT_MS || undefined,
    commandTimeoutMs: env.PKGINDEX_COMMAND_TIMEOUT_MS || undefined,
    httpRetries: env.PKGINDEX_HTTP_RETRIES || undefined,
    logLevel: env.PKGINDEX_LOG_LEVEL || undefined,
  });
}
