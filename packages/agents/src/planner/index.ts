export {
    PlannerCapability,
    readPlannedWorkout,
    toPlannerMessage,
    FALLBACK_DURATION_MINUTES,
    FALLBACK_WORKOUT_NAME,
} from './planner-capability.js';
export type { PlannedWorkout, PlannerCapabilityOptions } from './planner-capability.js';
export { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt } from './prompt.js';
export { createPlannerTools, SearchExercisesInputSchema } from './tools.js';
export type { PlannerToolsOptions } from './tools.js';
export { createPlannerAgentCard, PLANNER_AGENT_NAME } from './agent-card.js';
