/**
 * A2A task protocol, server side
 *
 * @module a2a
 */

export * from './capability.js';
export * from './dispatcher.js';
export * from './request-parser.js';
