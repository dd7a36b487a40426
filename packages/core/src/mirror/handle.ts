/*
 * PACKAGE.broker
 * Copyright (C) 2025 Łukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Handle to a mirror directory holding the package index

import fs from 'node:fs/promises';
import path from 'node:path';
import { INDEX_ETAG, INDEX_TAR, INDEX_TAR_GZ, INDEX_TAR_GZ_TMP } from '@pkgindex/shared';

export interface IndexPaths {
  /** Uncompressed archive read by queries */
  tar: string;
  /** Last successfully fetched compressed archive */
  tarGz: string;
  /** Download staging file */
  tarGzTmp: string;
  /** Cached entity tag */
  etag: string;
}

export function indexPaths(dir: string): IndexPaths {
  return {
    tar: path.join(dir, INDEX_TAR),
    tarGz: path.join(dir, INDEX_TAR_GZ),
    tarGzTmp: path.join(dir, INDEX_TAR_GZ_TMP),
    etag: path.join(dir, INDEX_ETAG),
  };
}

/**
 * Wrapper around the absolute path of an existing mirror directory.
 * Carries no contents; the archive is read anew by every query.
 */
export class IndexHandle {
  readonly paths: IndexPaths;

  private constructor(readonly dir: string) {
    this.paths = indexPaths(dir);
  }

  /**
   * Try to get a handle for a mirror directory
   * @returns Handle if `dir` exists as a directory right now, null otherwise
   */
  static async open(dir: string): Promise<IndexHandle | null> {
    const absolute = path.resolve(dir);
    try {
      const stats = await fs.stat(absolute);
      return stats.isDirectory() ? new IndexHandle(absolute) : null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Create the mirror directory (recursively) and return its handle
   */
  static async create(dir: string): Promise<IndexHandle> {
    const absolute = path.resolve(dir);
    await fs.mkdir(absolute, { recursive: true });
    return new IndexHandle(absolute);
  }
}

/**
 * Present iff `dir` exists as a directory at call time
 */
export function tryGetHandle(dir: string): Promise<IndexHandle | null> {
  return IndexHandle.open(dir);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
