export * from './config.js';
export * from './errors.js';
export * from './schemas.js';
export * from './selectors.js';
export type * from './pipeline/types.js';
