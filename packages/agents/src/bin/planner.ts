import { loadEnvironment } from '@pacer/core';
import { createBedrockModel } from '../llm/model.js';
import { PLANNER_AGENT_NAME, createPlannerAgentCard } from '../planner/agent-card.js';
import { PlannerCapability } from '../planner/planner-capability.js';
import { advertisedUrl, createAgentLogger, runAgent } from '../runtime.js';

const env = loadEnvironment();
const logger = createAgentLogger(env, PLANNER_AGENT_NAME);

runAgent({
    agentCard: createPlannerAgentCard(advertisedUrl(env, env.BIOMECHANICS_URL)),
    capability: new PlannerCapability({ model: createBedrockModel(env, logger), logger }),
    logger,
    port: env.BIOMECHANICS_PORT,
});
