// Sync types

import type { IndexConfig, SyncStrategyName } from '@pkgindex/shared';
import type { IndexError } from '../errors';
import type { IndexHandle } from '../mirror/handle';
import type { CommandRunner } from '../process/runner';
import type { ExecutableLocator } from '../process/executable';

export interface SyncOutcome {
  /** False when the server reported the cached archive as current */
  refreshed: boolean;
}

/**
 * One way of refreshing the mirror's archive
 */
export interface SyncStrategy {
  readonly name: SyncStrategyName;
  /**
   * @throws IndexError for every failure in the error taxonomy
   */
  sync(handle: IndexHandle): Promise<SyncOutcome>;
}

export type SyncResult =
  | { success: true; strategy: SyncStrategyName; refreshed: boolean }
  | { success: false; strategy: SyncStrategyName; error: IndexError };

/**
 * Collaborators of an index update, passed explicitly
 */
export interface SyncDependencies {
  config: IndexConfig;
  runner: CommandRunner;
  findExecutable: ExecutableLocator;
}
