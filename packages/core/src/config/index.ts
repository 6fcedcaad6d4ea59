export * from './env.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
