// Core package exports

export * from './errors';
export * from './config';
export * from './mirror/handle';
export * from './mirror/scanner';
export * from './process';
export * from './sync';
export * from './middleware';
export * from './factory';
export * from './utils/logger';
export * from './utils/download';
export * from './utils/gunzip';
export type { AppEnv, AppVariables } from './app-env';
