/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Git strategy: shallow clone, fetch tags, export the published tag as a tarball

import fs from 'node:fs/promises';
import path from 'node:path';
import { GIT_INDEX_BRANCH, GIT_INDEX_REF, GIT_UPDATE_DIR } from '@pkgindex/shared';
import { InvalidConfigError, SignatureVerificationError, ToolMissingError } from '../../errors';
import type { IndexHandle } from '../../mirror/handle';
import { runIn } from '../../process/runner';
import { getLogger, toError } from '../../utils/logger';
import type { SyncDependencies, SyncOutcome, SyncStrategy } from '../types';

/**
 * Local clone directory name: base name of the remote URL without extension
 */
export function cloneNameFromUrl(gitUrl: string): string {
  const name = path.posix.parse(gitUrl.replace(/[/\\]+$/, '')).name;
  if (!name || name === '.' || name === '..') {
    throw new InvalidConfigError(`Cannot derive a clone directory name from ${gitUrl}`);
  }
  return name;
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export function createGitStrategy(deps: SyncDependencies): SyncStrategy {
  const { config, runner } = deps;

  return {
    name: 'git',

    async sync(handle: IndexHandle): Promise<SyncOutcome> {
      const logger = getLogger();
      await fs.mkdir(handle.dir, { recursive: true });

      const git = await deps.findExecutable('git');
      if (!git) {
        throw new ToolMissingError('git');
      }

      const repoName = cloneNameFromUrl(config.gitUrl);
      const updateDir = path.join(config.storageRoot, GIT_UPDATE_DIR);
      const cloneDir = path.join(updateDir, repoName);
      const timeout = config.commandTimeoutMs;

      if (!(await isDirectory(cloneDir))) {
        logger.info('Cloning repository for first time', { gitUrl: config.gitUrl, cloneDir });
        await fs.mkdir(updateDir, { recursive: true });
        await runIn(
          runner,
          updateDir,
          git,
          ['clone', config.gitUrl, repoName, '--depth', '1', '-b', GIT_INDEX_BRANCH],
          { timeout }
        );
      }

      await runIn(runner, cloneDir, git, ['fetch', '--tags', '--depth=1'], { timeout });

      const tarFile = handle.paths.tar;
      await fs.rm(tarFile, { force: true }).catch((error: unknown) => {
        logger.warn('Could not remove stale index tarball', { tarFile, error: toError(error).message });
      });

      if (config.verifySignatures) {
        await runIn(runner, cloneDir, git, ['tag', '-v', GIT_INDEX_REF], {
          timeout,
          onFailure: (result) => new SignatureVerificationError(result.stderr),
        });
      }

      logger.debug('Exporting a tarball', { tarFile, ref: GIT_INDEX_REF });
      await runIn(runner, cloneDir, git, ['archive', '--format=tar', '-o', tarFile, GIT_INDEX_REF], {
        timeout,
      });

      return { refreshed: true };
    },
  };
}
