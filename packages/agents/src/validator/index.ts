export {
    ValidatorCapability,
    parseValidationRequest,
    readConflictAnalysis,
    toValidatorMessage,
} from './validator-capability.js';
export type { ScheduleSummary, ValidatorCapabilityOptions } from './validator-capability.js';
export {
    VALIDATOR_SYSTEM_PROMPT,
    DEFAULT_VALIDATION_LOCATION,
    buildValidationPrompt,
    requiredEquipmentOf,
} from './prompt.js';
export {
    createValidatorTools,
    CalendarInputSchema,
    EquipmentCheckInputSchema,
    InventoryInputSchema,
} from './tools.js';
export type { ValidatorToolsOptions } from './tools.js';
export { createValidatorAgentCard, VALIDATOR_AGENT_NAME } from './agent-card.js';
