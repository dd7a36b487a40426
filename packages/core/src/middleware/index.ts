export * from './request-id';
export * from './error-handler';
