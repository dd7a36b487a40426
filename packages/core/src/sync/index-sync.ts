/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Index update orchestrator

import type { IndexConfig } from '@pkgindex/shared';
import { IndexError } from '../errors';
import { IndexHandle, tryGetHandle } from '../mirror/handle';
import { createCommandRunner } from '../process/runner';
import { findExecutable } from '../process/executable';
import { getLogger } from '../utils/logger';
import { createGitStrategy } from './strategies/git';
import { createHttpStrategy } from './strategies/http';
import type { SyncDependencies, SyncResult, SyncStrategy } from './types';

/**
 * Build sync dependencies, using the real process runner and PATH lookup
 * unless overridden
 */
export function createSyncDependencies(
  config: IndexConfig,
  overrides: Partial<Omit<SyncDependencies, 'config'>> = {}
): SyncDependencies {
  return {
    config,
    runner: overrides.runner ?? createCommandRunner(),
    findExecutable: overrides.findExecutable ?? findExecutable,
  };
}

/**
 * Git when the executable is available, HTTP otherwise.
 * Chosen once per update; a failing transport never falls back to the other.
 */
export async function selectStrategy(deps: SyncDependencies): Promise<SyncStrategy> {
  const git = await deps.findExecutable('git');
  return git ? createGitStrategy(deps) : createHttpStrategy(deps);
}

/**
 * Update the index tarball of a mirror
 */
export async function syncMirror(handle: IndexHandle, deps: SyncDependencies): Promise<SyncResult> {
  const logger = getLogger();
  const strategy = await selectStrategy(deps);

  logger.info('Updating package index', { dir: handle.dir, strategy: strategy.name });

  try {
    const { refreshed } = await strategy.sync(handle);
    logger.info('Package index updated', { dir: handle.dir, strategy: strategy.name, refreshed });
    return { success: true, strategy: strategy.name, refreshed };
  } catch (error) {
    if (!(error instanceof IndexError)) {
      throw error;
    }
    logger.error('Package index update failed', { dir: handle.dir, strategy: strategy.name }, error);
    return { success: false, strategy: strategy.name, error };
  }
}

/**
 * Load the package index; if the mirror does not exist, create and update it.
 * The handle is returned even when that update failed, so it does not imply a
 * queryable archive.
 */
export async function ensureHandle(dir: string, deps: SyncDependencies): Promise<IndexHandle> {
  const existing = await tryGetHandle(dir);
  if (existing) {
    return existing;
  }

  const handle = await IndexHandle.create(dir);
  await syncMirror(handle, deps);
  return handle;
}
