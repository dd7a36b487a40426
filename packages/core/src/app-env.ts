import type { SyncDependencies } from './sync/types';

export interface AppVariables {
  deps: SyncDependencies;
  /** Mirror directory served by this app */
  indexDir: string;
  requestId?: string;
}

export type AppEnv = { Variables: AppVariables };
