#!/usr/bin/env node

/*
 * PACKAGE.broker - CLI
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { fileURLToPath } from 'node:url';
import { realpathSync } from 'node:fs';
import { config } from 'dotenv';
import {
  createSyncDependencies,
  ensureHandle,
  getLogger,
  IndexError,
  IndexHandle,
  loadConfig,
  queryVersions,
  syncMirror,
  toError,
  tryGetHandle,
  type ConfigEnv,
  type SyncDependencies,
} from '@pkgindex/core';
import { packageNameSchema, sortVersions } from '@pkgindex/shared';

const COLORS = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

function log(message: string, color: keyof typeof COLORS = 'reset'): void {
  console.log(`${COLORS[color]}${message}${COLORS.reset}`);
}

function fail(message: string): number {
  console.error(`${COLORS.red}${message}${COLORS.reset}`);
  return 1;
}

const USAGE = [
  'Usage: pkgindex <command>',
  '',
  'Commands:',
  '  update               Download or refresh the package index',
  '  versions <package>   List the versions of a package in the index',
  '  help                 Show this message',
];

function printUsage(): void {
  for (const line of USAGE) {
    log(line, line.startsWith('Usage') ? 'bright' : 'reset');
  }
}

async function update(deps: SyncDependencies): Promise<number> {
  const dir = deps.config.indexDir;
  const handle = (await tryGetHandle(dir)) ?? (await IndexHandle.create(dir));

  const result = await syncMirror(handle, deps);
  if (!result.success) {
    return fail(`❌ Index update via ${result.strategy} failed: ${result.error.message}`);
  }

  log(
    result.refreshed
      ? `✅ Package index updated via ${result.strategy}`
      : '✅ Package index is already up to date',
    'green'
  );
  return 0;
}

async function versions(deps: SyncDependencies, name: string | undefined): Promise<number> {
  const parsed = packageNameSchema.safeParse(name);
  if (!parsed.success) {
    return fail('Please provide a package name: pkgindex versions <package>');
  }

  try {
    // Downloads the index on first use
    const handle = await ensureHandle(deps.config.indexDir, deps);
    const found = await queryVersions(handle, parsed.data);
    if (!found) {
      return fail(`⚠️  No versions of ${parsed.data} in the package index`);
    }
    for (const version of sortVersions(found)) {
      console.log(version);
    }
    return 0;
  } catch (error) {
    if (error instanceof IndexError) {
      return fail(`❌ ${error.message}`);
    }
    throw error;
  }
}

/**
 * Run the CLI with the given arguments (without node and script path)
 * @returns Process exit code
 */
export async function run(
  argv: string[],
  env: ConfigEnv = process.env,
  overrides: Partial<Omit<SyncDependencies, 'config'>> = {}
): Promise<number> {
  const [command, ...rest] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    printUsage();
    return 0;
  }

  const indexConfig = loadConfig(env);
  getLogger(indexConfig.logLevel);
  const deps = createSyncDependencies(indexConfig, overrides);

  switch (command) {
    case 'update':
      return update(deps);
    case 'versions':
      return versions(deps, rest[0]);
    default:
      printUsage();
      return fail(`Unknown command: ${command}`);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  config();
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      getLogger().error('Command failed', { argv: process.argv.slice(2) }, toError(error));
      process.exitCode = 1;
    }
  );
}
