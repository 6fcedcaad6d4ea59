import { loadEnvironment } from '@pacer/core';
import {
    ORCHESTRATOR_AGENT_NAME,
    createOrchestratorAgentCard,
} from '../orchestrator/agent-card.js';
import { createOrchestratorCapability } from '../orchestrator/create-orchestrator.js';
import { advertisedUrl, createAgentLogger, runAgent } from '../runtime.js';

const env = loadEnvironment();
const logger = createAgentLogger(env, ORCHESTRATOR_AGENT_NAME);

runAgent({
    agentCard: createOrchestratorAgentCard(
        advertisedUrl(env, env.ORCHESTRATOR_URL ?? `http://localhost:${env.ORCHESTRATOR_PORT}`)
    ),
    capability: createOrchestratorCapability({ env, logger }),
    logger,
    port: env.ORCHESTRATOR_PORT,
});
