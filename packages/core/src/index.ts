/**
 * @pacer/core - Main entry point
 *
 * Wire types, domain types and the ambient stack (errors, logging,
 * configuration) shared by the server, client and agents.
 */

// A2A protocol
export * from './a2a/index.js';

// Fitness domain
export * from './fitness/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Configuration
export * from './config/index.js';
