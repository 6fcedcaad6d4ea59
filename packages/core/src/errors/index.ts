export * from './types.js';
export * from './runtime-error.js';
export * from './error-conversion.js';
