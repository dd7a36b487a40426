export * from './types';
export * from './index-sync';
export * from './strategies/git';
export * from './strategies/http';
