import { serve } from '@hono/node-server';
import type { AgentCard, Logger } from '@pacer/core';
import { createA2AApp } from './index.js';
import type { A2AApp } from './types.js';
import type { AgentCapability } from '../a2a/capability.js';

export type StartA2AServerOptions = {
    agentCard: AgentCard;
    capability: AgentCapability;
    logger: Logger;
    port: number;
    /** Hostname to bind to. Defaults to 0.0.0.0 */
    hostname?: string;
};

export type StartA2AServerResult = {
    app: A2AApp;
    /** Stop accepting connections and wait for the server to close */
    stop: () => Promise<void>;
};

/**
 * Start an agent's A2A server on Node.js.
 *
 * @example
 * ```typescript
 * const { stop } = startA2AServer({
 *     agentCard,
 *     capability: new PlannerCapability(model, logger),
 *     logger,
 *     port: 8082,
 * });
 * ```
 */
export function startA2AServer(options: StartA2AServerOptions): StartA2AServerResult {
    const { agentCard, capability, logger, port, hostname = '0.0.0.0' } = options;

    logger.info(`Initializing ${agentCard.name} A2A server on ${hostname}:${port}...`);
    const app = createA2AApp({ agentCard, capability, logger });

    const server = serve({ fetch: app.fetch, port, hostname }, (info) => {
        logger.info(`Server running at http://${hostname}:${info.port}`, {
            agentCard: `${agentCard.url}/.well-known/agent.json`,
        });
    });

    return {
        app,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                logger.info(`Stopping ${agentCard.name} server...`);
                server.close((error) => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    logger.info('Server stopped');
                    resolve();
                });
            }),
    };
}
