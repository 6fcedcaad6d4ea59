export { createLogger, createTransport, parseLoggerConfig } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';

export * from './types.js';
export * from './schemas.js';
export { PacerLogger } from './pacer-logger.js';
export type { PacerLoggerConfig } from './pacer-logger.js';
export * from './transports/console-transport.js';
export * from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
