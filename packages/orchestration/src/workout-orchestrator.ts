/**
 * WorkoutOrchestrator
 *
 * Planner, then validator, then at most one refinement call to the planner.
 * A request costs two or three peer round-trips, never more.
 */

import { PacerLogComponent } from '@pacer/core';
import type { ConflictAnalysis, Logger, WorkoutConstraints } from '@pacer/core';
import { OrchestrationError, isOrchestrationError } from './errors.js';
import type {
    OrchestrationProgress,
    OrchestrationRequest,
    OrchestrationResult,
    OrchestrationRole,
    WorkoutPlanner,
    WorkoutValidator,
} from './types.js';

export interface WorkoutOrchestratorConfig {
    planner: WorkoutPlanner;
    validator: WorkoutValidator;
    logger: Logger;
}

const SESSION_LENGTH_PATTERN = /(\d+)(?:\s*(?:-|–|to)\s*(\d+))?\s*-?\s*min/i;

/**
 * Session length a time conflict asks for, taking the upper end of a range.
 */
export function suggestedDuration(analysis: ConflictAnalysis): number | undefined {
    for (const conflict of analysis.conflicts) {
        if (conflict.type !== 'time') continue;
        for (const text of [conflict.suggestion, conflict.message]) {
            const match = SESSION_LENGTH_PATTERN.exec(text);
            if (match?.[1] !== undefined) {
                return parseInt(match[2] ?? match[1], 10);
            }
        }
    }
    return undefined;
}

/**
 * Text handed to the planner with a refinement call.
 */
export function refinementContext(analysis: ConflictAnalysis): string {
    if (analysis.recommendation) {
        return analysis.recommendation;
    }
    return analysis.conflicts.map((conflict) => `${conflict.type}: ${conflict.message}`).join('; ');
}

function refinedConstraints(
    constraints: WorkoutConstraints,
    analysis: ConflictAnalysis
): WorkoutConstraints {
    const duration = suggestedDuration(analysis);
    return duration === undefined ? constraints : { ...constraints, duration };
}

export class WorkoutOrchestrator {
    private readonly planner: WorkoutPlanner;
    private readonly validator: WorkoutValidator;
    private readonly logger: Logger;

    constructor(config: WorkoutOrchestratorConfig) {
        this.planner = config.planner;
        this.validator = config.validator;
        this.logger = config.logger.createChild(PacerLogComponent.ORCHESTRATION);
    }

    async run(request: OrchestrationRequest): Promise<OrchestrationResult> {
        const steps = this.steps(request);
        let next = await steps.next();
        while (!next.done) {
            next = await steps.next();
        }
        return next.value;
    }

    /**
     * Run the orchestration, yielding a progress update as each phase starts.
     */
    async *steps(
        request: OrchestrationRequest
    ): AsyncGenerator<OrchestrationProgress, OrchestrationResult, undefined> {
        const { goal, constraints } = request;

        yield { phase: 'planning', message: 'Requesting a workout plan from the planner' };
        const plan = await this.call('planner', () =>
            this.planner.plan({ goal, constraints, isCompromise: false })
        );
        this.logger.info(`Planner proposed '${plan.workout.name}'`, {
            estimatedDuration: plan.workout.estimatedDuration,
            exercises: plan.workout.exercises.length,
        });

        yield { phase: 'validating', message: 'Checking the plan against schedule and equipment' };
        const validation = await this.call('validator', () =>
            this.validator.validate({
                workout: plan.workout,
                ...(request.date !== undefined && { date: request.date }),
                ...(request.location !== undefined && { location: request.location }),
            })
        );
        const { analysis } = validation;
        const schedule = validation.schedule !== undefined ? { schedule: validation.schedule } : {};

        if (!analysis.hasConflicts) {
            this.logger.info('Plan validated without conflicts');
            return {
                workout: plan.workout,
                analysis,
                hasConflicts: false,
                isCompromise: false,
                ...schedule,
                plannerCalls: 1,
            };
        }

        this.logger.info(`Validator reported ${analysis.conflicts.length} conflict(s), refining`, {
            conflicts: analysis.conflicts.map((conflict) => conflict.type),
        });
        yield { phase: 'refining', message: 'Conflicts found, requesting a compromise plan' };
        const refined = await this.call('planner', () =>
            this.planner.plan({
                goal,
                constraints: refinedConstraints(constraints, analysis),
                isCompromise: true,
                context: refinementContext(analysis),
            })
        );

        return {
            workout: refined.workout,
            analysis,
            hasConflicts: true,
            isCompromise: true,
            ...schedule,
            plannerCalls: 2,
        };
    }

    private async call<T>(role: OrchestrationRole, operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error) {
            if (isOrchestrationError(error)) {
                throw error;
            }
            const failure = OrchestrationError.roleFailed(role, error);
            this.logger.error(failure.message, failure.context);
            throw failure;
        }
    }
}
