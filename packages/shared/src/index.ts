export * from './constants';
export * from './schemas';
export * from './types';
export * from './versions';
