/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

import { readFile } from 'node:fs/promises';
import { extract as createExtract } from 'tar-stream';
import { INDEX_METADATA_SUFFIX, parseVersion, type Version } from '@pkgindex/shared';
import { IndexCorruptError, IndexError, IndexMissingError, InvalidVersionError } from '../errors';
import { getLogger } from '../utils/logger';
import { isNotFound, type IndexHandle } from './handle';

export interface MetadataEntry {
  name: string;
  version: string;
}

/**
 * Recognise `name/version/name.json` entries; anything else is irrelevant
 */
export function parseEntryPath(entryPath: string): MetadataEntry | null {
  const segments = entryPath.split('/');
  if (segments.length !== 3) {
    return null;
  }
  const [name, version, file] = segments;
  if (file !== `${name}${INDEX_METADATA_SUFFIX}`) {
    return null;
  }
  return { name, version };
}

/**
 * Visit every entry path of a tar archive in order, in a single pass.
 * A visitor error stops the scan and is rethrown as is; decoder failures
 * become IndexCorruptError.
 */
export function forEachEntry(
  data: Buffer,
  tarPath: string,
  visit: (entryPath: string) => void
): Promise<void> {
  return new Promise((resolve, reject) => {
    const extract = createExtract();
    let failed = false;

    extract.on('entry', (header, stream, next) => {
      try {
        visit(header.name);
      } catch (error) {
        failed = true;
        extract.destroy(error instanceof Error ? error : new Error(String(error)));
        return;
      }
      stream.on('end', () => next());
      stream.resume();
    });

    extract.on('finish', () => {
      if (!failed) resolve();
    });

    extract.on('error', (error: unknown) => {
      failed = true;
      reject(error instanceof IndexError ? error : new IndexCorruptError(tarPath, error));
    });

    extract.end(data);
  });
}

/**
 * Fetch all versions of a package listed in the mirrored index
 * @returns Versions found, or null when the index lists none
 */
export async function queryVersions(
  handle: IndexHandle,
  packageName: string
): Promise<Set<Version> | null> {
  const tarPath = handle.paths.tar;
  const logger = getLogger();
  logger.debug('Iterating through tarball', { tarPath, packageName });

  let data: Buffer;
  try {
    data = await readFile(tarPath);
  } catch (error) {
    if (isNotFound(error)) {
      throw new IndexMissingError(tarPath);
    }
    throw error;
  }

  const versions = new Set<Version>();

  await forEachEntry(data, tarPath, (entryPath) => {
    const entry = parseEntryPath(entryPath);
    if (!entry || entry.name !== packageName) {
      return;
    }
    const version = parseVersion(entry.version);
    if (version === null) {
      throw new InvalidVersionError(tarPath, entryPath, entry.version);
    }
    versions.add(version);
  });

  return versions.size === 0 ? null : versions;
}
