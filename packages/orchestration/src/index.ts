/**
 * @pacer/orchestration
 *
 * Bounded planner/validator orchestration over A2A peers.
 */

export {
    WorkoutOrchestrator,
    suggestedDuration,
    refinementContext,
} from './workout-orchestrator.js';
export type { WorkoutOrchestratorConfig } from './workout-orchestrator.js';

export {
    OrchestratorCapability,
    toOrchestrationRequest,
    toResultMessage,
    summarizeResult,
} from './orchestrator-capability.js';

export {
    PlannerRole,
    buildPlanMessage,
    describePlanRequest,
    readPlannerReply,
} from './roles/planner-role.js';
export {
    ValidatorRole,
    buildValidationMessage,
    readValidatorReply,
    requiredEquipment,
} from './roles/validator-role.js';
export type { PeerAgent } from './roles/types.js';

export { OrchestrationError, isOrchestrationError } from './errors.js';
export type { OrchestrationErrorContext } from './errors.js';
export { OrchestrationErrorCode } from './error-codes.js';

export type * from './types.js';
