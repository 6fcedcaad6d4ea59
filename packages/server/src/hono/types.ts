import type { OpenAPIHono } from '@hono/zod-openapi';
import type { TaskStore } from '../tasks/task-store.js';

export type A2AApp = OpenAPIHono & {
    taskStore: TaskStore;
};
