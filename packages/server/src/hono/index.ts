import { OpenAPIHono } from '@hono/zod-openapi';
import type { AgentCard, Logger } from '@pacer/core';
import { PacerLogComponent } from '@pacer/core';
import type { A2AApp } from './types.js';
import { createHealthRouter } from './routes/health.js';
import { createA2aRouter } from './routes/a2a.js';
import { createA2AJsonRpcRouter } from './routes/a2a-jsonrpc.js';
import { createErrorHandler } from './middleware/error.js';
import { A2ADispatcher } from '../a2a/dispatcher.js';
import type { AgentCapability } from '../a2a/capability.js';
import { TaskStore } from '../tasks/task-store.js';

export type CreateA2AAppOptions = {
    agentCard: AgentCard;
    capability: AgentCapability;
    logger: Logger;
    /** Defaults to a fresh store owned by this app */
    taskStore?: TaskStore;
};

/**
 * Build the HTTP surface of one agent process:
 * - POST / (A2A JSON-RPC, SSE for tasks/sendSubscribe)
 * - GET /.well-known/agent.json
 * - GET /health, GET /ping, GET /
 */
export function createA2AApp(options: CreateA2AAppOptions): A2AApp {
    const { agentCard, capability } = options;
    const logger = options.logger.createChild(PacerLogComponent.API);
    const taskStore = options.taskStore ?? new TaskStore();
    const dispatcher = new A2ADispatcher({ store: taskStore, capability, logger: options.logger });

    const app = new OpenAPIHono({ strict: false });

    app.onError(createErrorHandler(logger));

    app.route('/', createHealthRouter(agentCard.name))
        .route('/', createA2aRouter(() => agentCard))
        .route('/', createA2AJsonRpcRouter(dispatcher, logger));

    app.doc('/openapi.json', {
        openapi: '3.0.0',
        info: {
            title: `${agentCard.name} API`,
            version: agentCard.version,
            description: agentCard.description,
        },
    });

    return Object.assign(app, { taskStore });
}
