export * from './error-conversion.js';
export * from './safe-stringify.js';
export * from './abort.js';
export * from './api-key-resolver.js';
export * from './schema.js';
