export * from './hono/index.js';
export * from './hono/start-server.js';
export type { A2AApp } from './hono/types.js';
export * from './a2a/index.js';
export * from './tasks/task-store.js';
export * from './events/task-sse-stream.js';
