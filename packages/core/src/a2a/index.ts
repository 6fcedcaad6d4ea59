export * from './types.js';
export * from './jsonrpc.js';
export * from './schemas.js';
export * from './message.js';
export * from './events.js';
