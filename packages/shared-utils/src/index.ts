export * from './logger.js';
export * from './env.js';
export * from './date.js';
export * from './errors.js';
export * from './collections.js';
