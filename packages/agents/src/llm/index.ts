export {
    VercelAgentModel,
    createBedrockModel,
    DEFAULT_MAX_STEPS,
    DEFAULT_MAX_OUTPUT_TOKENS,
    DEFAULT_TEMPERATURE,
} from './model.js';
export type { AgentModel, AgentModelRequest, VercelAgentModelOptions } from './model.js';
export { extractJsonObject } from './extract-json.js';
