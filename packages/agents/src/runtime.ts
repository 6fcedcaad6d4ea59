import { createLogger, toErrorMessage } from '@pacer/core';
import type { AgentCard, Logger, PacerEnvironment } from '@pacer/core';
import { startA2AServer } from '@pacer/server';
import type { AgentCapability, StartA2AServerResult } from '@pacer/server';

export function createAgentLogger(env: PacerEnvironment, agentId: string): Logger {
    return createLogger({ config: { level: env.LOG_LEVEL }, agentId });
}

/**
 * URL advertised in the agent card: AGENT_URL when set, else the given default.
 */
export function advertisedUrl(env: PacerEnvironment, fallback: string): string {
    return env.AGENT_URL ?? fallback;
}

export interface RunAgentOptions {
    agentCard: AgentCard;
    capability: AgentCapability;
    logger: Logger;
    port: number;
}

/**
 * Serve an agent until SIGINT or SIGTERM, then close the server and exit.
 */
export function runAgent(options: RunAgentOptions): StartA2AServerResult {
    const { logger } = options;
    const server = startA2AServer(options);

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals) => {
        if (shuttingDown) return;
        shuttingDown = true;

        logger.info(`Received ${signal}, shutting down gracefully...`);
        try {
            await server.stop();
            process.exit(0);
        } catch (error) {
            logger.error(`Shutdown error: ${toErrorMessage(error)}`, { error });
            process.exit(1);
        }
    };

    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    signals.forEach((signal) => {
        process.on(signal, () => void shutdown(signal));
    });

    return server;
}
