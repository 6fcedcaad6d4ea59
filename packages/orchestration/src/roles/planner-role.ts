import {
    WorkoutSchema,
    createDataPart,
    createMessage,
    createTextPart,
    findDataPart,
    getTextFromMessage,
} from '@pacer/core';
import type { Message, WorkoutRequest } from '@pacer/core';
import { OrchestrationError } from '../errors.js';
import type { PlannerReply, WorkoutPlanner } from '../types.js';
import type { PeerAgent } from './types.js';

/**
 * Text part for a planner request. Carries the same facts as the data part
 * for agents that only read text.
 */
export function describePlanRequest(request: WorkoutRequest): string {
    const { goal, constraints, isCompromise, context } = request;
    let text = `Create a workout plan: ${goal}`;
    if (constraints.duration) {
        text += ` (${constraints.duration} minutes)`;
    }
    if (constraints.equipment && constraints.equipment.length > 0) {
        text += ` using ${constraints.equipment.join(', ')}`;
    }
    if (constraints.muscleGroups && constraints.muscleGroups.length > 0) {
        text += ` targeting ${constraints.muscleGroups.join(', ')}`;
    }
    if (isCompromise) {
        text += '. This is a compromise request - prioritize intensity over duration.';
        if (context) {
            text += ` Validator feedback: ${context}`;
        }
    }
    return text;
}

export function buildPlanMessage(request: WorkoutRequest): Message {
    return createMessage('user', [
        createTextPart(describePlanRequest(request)),
        createDataPart({
            goal: request.goal,
            constraints: request.constraints,
            isCompromise: request.isCompromise,
            ...(request.context !== undefined && { context: request.context }),
        }),
    ]);
}

/**
 * Reads the `workout` data part of a planner reply.
 */
export function readPlannerReply(message: Message): PlannerReply {
    const part = findDataPart(message, 'workout');
    if (!part) {
        throw OrchestrationError.invalidRoleReply('planner', 'no workout data part');
    }
    const parsed = WorkoutSchema.safeParse(part.data.workout);
    if (!parsed.success) {
        throw OrchestrationError.invalidRoleReply(
            'planner',
            `malformed workout: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
        );
    }
    return { workout: parsed.data, summary: getTextFromMessage(message) };
}

/**
 * Planner role over an A2A peer ("biomechanics-lab").
 */
export class PlannerRole implements WorkoutPlanner {
    constructor(private readonly agent: PeerAgent) {}

    async plan(request: WorkoutRequest): Promise<PlannerReply> {
        const reply = await this.agent.send(buildPlanMessage(request), {
            taskIdPrefix: request.isCompromise ? 'compromise-' : 'workout-',
        });
        return readPlannerReply(reply);
    }
}
