import { loadEnvironment } from '@pacer/core';
import { createBedrockModel } from '../llm/model.js';
import { VALIDATOR_AGENT_NAME, createValidatorAgentCard } from '../validator/agent-card.js';
import { ValidatorCapability } from '../validator/validator-capability.js';
import { advertisedUrl, createAgentLogger, runAgent } from '../runtime.js';

const env = loadEnvironment();
const logger = createAgentLogger(env, VALIDATOR_AGENT_NAME);

runAgent({
    agentCard: createValidatorAgentCard(advertisedUrl(env, env.LIFESYNC_URL)),
    capability: new ValidatorCapability({ model: createBedrockModel(env, logger), logger }),
    logger,
    port: env.LIFESYNC_PORT,
});
