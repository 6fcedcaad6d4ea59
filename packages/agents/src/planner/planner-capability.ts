import { WorkoutSchema, createDataPart, createMessage, createTextPart } from '@pacer/core';
import type { Logger, Message, Workout, WorkoutRequest } from '@pacer/core';
import { parseWorkoutRequest } from '@pacer/server';
import type { AgentCapability, CapabilityContext, CapabilityUpdate } from '@pacer/server';
import { extractJsonObject } from '../llm/extract-json.js';
import type { AgentModel, AgentModelRequest } from '../llm/model.js';
import type { CatalogExercise } from '../tools/exercise-catalog.js';
import { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt } from './prompt.js';
import { createPlannerTools } from './tools.js';

export const FALLBACK_WORKOUT_NAME = 'Custom Workout';
export const FALLBACK_DURATION_MINUTES = 45;

export interface PlannedWorkout {
    workout: Workout;
    /** Raw model text, kept when no plan could be read from it */
    reasoning?: string;
}

/**
 * The workout in a model reply, or an empty plan carrying the reply as
 * reasoning.
 */
export function readPlannedWorkout(text: string, request: WorkoutRequest): PlannedWorkout {
    const json = extractJsonObject(text, 'workout');
    if (json) {
        const parsed = WorkoutSchema.safeParse(json['workout']);
        if (parsed.success) {
            return { workout: parsed.data };
        }
    }
    return {
        workout: {
            name: FALLBACK_WORKOUT_NAME,
            estimatedDuration: request.constraints.duration || FALLBACK_DURATION_MINUTES,
            exercises: [],
        },
        reasoning: text,
    };
}

export function toPlannerMessage(planned: PlannedWorkout): Message {
    const { workout } = planned;
    return createMessage('assistant', [
        createTextPart(
            `Here is your ${workout.name} workout plan (${workout.estimatedDuration} minutes):`
        ),
        createDataPart({
            workout,
            ...(planned.reasoning !== undefined && { reasoning: planned.reasoning }),
        }),
    ]);
}

export interface PlannerCapabilityOptions {
    model: AgentModel;
    logger: Logger;
    catalog?: CatalogExercise[];
}

/**
 * The planner agent: goal and constraints in, structured workout out.
 */
export class PlannerCapability implements AgentCapability {
    private readonly model: AgentModel;
    private readonly logger: Logger;
    private readonly catalog: CatalogExercise[] | undefined;

    constructor(options: PlannerCapabilityOptions) {
        this.model = options.model;
        this.logger = options.logger;
        this.catalog = options.catalog;
    }

    async execute(message: Message, context: CapabilityContext): Promise<Message> {
        const request = parseWorkoutRequest(message);
        context.logger.info(`Planning workout: ${request.goal}`, {
            taskId: context.taskId,
            isCompromise: request.isCompromise,
        });

        const text = await this.model.generate(this.modelRequest(request));
        return toPlannerMessage(readPlannedWorkout(text, request));
    }

    async *stream(
        message: Message,
        context: CapabilityContext
    ): AsyncGenerator<CapabilityUpdate, Message, undefined> {
        const request = parseWorkoutRequest(message);
        context.logger.info(`Planning workout (streaming): ${request.goal}`, {
            taskId: context.taskId,
            isCompromise: request.isCompromise,
        });
        yield {
            type: 'progress',
            message: request.isCompromise
                ? 'Designing a compromise workout plan'
                : 'Designing a workout plan',
        };

        let text = '';
        for await (const chunk of this.model.stream(this.modelRequest(request))) {
            text += chunk;
            yield { type: 'chunk', text: chunk };
        }
        return toPlannerMessage(readPlannedWorkout(text, request));
    }

    private modelRequest(request: WorkoutRequest): AgentModelRequest {
        return {
            system: PLANNER_SYSTEM_PROMPT,
            prompt: buildPlannerPrompt(request),
            tools: createPlannerTools({
                logger: this.logger,
                ...(this.catalog && { catalog: this.catalog }),
            }),
        };
    }
}
