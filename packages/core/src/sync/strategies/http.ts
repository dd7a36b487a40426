/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// HTTP strategy: conditional download of the compressed index

import fs from 'node:fs/promises';
import { ETAG_MAX_BYTES } from '@pkgindex/shared';
import { IndexCorruptError } from '../../errors';
import { isNotFound, type IndexHandle } from '../../mirror/handle';
import { fetchConditional, saveResponseBody } from '../../utils/download';
import { gunzipFile } from '../../utils/gunzip';
import { getLogger } from '../../utils/logger';
import type { SyncDependencies, SyncOutcome, SyncStrategy } from '../types';

/**
 * Read the cached entity tag, if any
 */
export async function readEtag(etagPath: string): Promise<string | null> {
  let raw: Buffer;
  try {
    raw = await fs.readFile(etagPath);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
  const etag = raw.subarray(0, ETAG_MAX_BYTES).toString('utf8').trim();
  return etag.length > 0 ? etag : null;
}

export function createHttpStrategy(deps: SyncDependencies): SyncStrategy {
  const { config } = deps;

  return {
    name: 'http',

    async sync(handle: IndexHandle): Promise<SyncOutcome> {
      const logger = getLogger();
      const url = config.httpUrl;
      const paths = handle.paths;

      await fs.mkdir(handle.dir, { recursive: true });

      if (config.verifySignatures) {
        logger.warn(
          'You have enabled GPG verification of the package index, but GPG verification only works with Git downloading',
          { url }
        );
      }

      const etag = await readEtag(paths.etag);
      logger.debug('Downloading package index', { url, conditional: etag !== null });

      const response = await fetchConditional(url, {
        etag,
        timeoutMs: config.requestTimeoutMs,
        retries: config.httpRetries,
      });

      if (response.status !== 200) {
        await response.body?.cancel();
        logger.info('Package index not downloaded', { url, status: response.status });
        return { refreshed: false };
      }

      // Artifact order: etag, staging file, archive in place, then the rename
      const newEtag = response.headers.get('ETag');
      if (newEtag !== null) {
        await fs.writeFile(paths.etag, newEtag);
      }

      await saveResponseBody(response, paths.tarGzTmp, url, config.requestTimeoutMs);

      try {
        await gunzipFile(paths.tarGzTmp, paths.tar);
      } catch (error) {
        throw new IndexCorruptError(paths.tarGzTmp, error);
      }

      await fs.rename(paths.tarGzTmp, paths.tarGz);
      logger.info('Package index downloaded', { url, etag: newEtag });

      return { refreshed: true };
    },
  };
}
