export * from './runner';
export * from './executable';
