/**
 * Orchestration Types
 *
 * Planner and validator roles as the orchestrator sees them, independent of
 * how the calls reach the peer agents.
 */

import type { ConflictAnalysis, Workout, WorkoutConstraints, WorkoutRequest } from '@pacer/core';

export type OrchestrationRole = 'planner' | 'validator';

export interface PlannerReply {
    workout: Workout;
    /** Text parts of the planner's reply */
    summary: string;
}

export interface ValidationInput {
    workout: Workout;
    /** YYYY-MM-DD; the validator uses today when absent */
    date?: string;
    location?: string;
}

/**
 * Free slots reported by the validator, when it looked at the calendar.
 */
export interface ScheduleSummary {
    availableSlots: string[];
    message: string;
}

export interface ValidatorReply {
    analysis: ConflictAnalysis;
    schedule?: ScheduleSummary;
}

export interface WorkoutPlanner {
    plan(request: WorkoutRequest): Promise<PlannerReply>;
}

export interface WorkoutValidator {
    validate(input: ValidationInput): Promise<ValidatorReply>;
}

export interface OrchestrationRequest {
    goal: string;
    constraints: WorkoutConstraints;
    date?: string;
    location?: string;
}

export interface OrchestrationResult {
    /** The planner's plan, or the refined plan when conflicts were found */
    workout: Workout;
    /** The validator's analysis of the first plan */
    analysis: ConflictAnalysis;
    hasConflicts: boolean;
    isCompromise: boolean;
    schedule?: ScheduleSummary;
    /** 1 without conflicts, 2 with a refinement */
    plannerCalls: 1 | 2;
}

export type OrchestrationPhase = 'planning' | 'validating' | 'refining';

export interface OrchestrationProgress {
    phase: OrchestrationPhase;
    message: string;
}
