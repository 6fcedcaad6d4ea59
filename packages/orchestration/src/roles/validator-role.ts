import { z } from 'zod';
import {
    ConflictAnalysisSchema,
    createDataPart,
    createMessage,
    createTextPart,
    findDataPart,
} from '@pacer/core';
import type { Message } from '@pacer/core';
import { OrchestrationError } from '../errors.js';
import type { ValidationInput, ValidatorReply, WorkoutValidator } from '../types.js';
import type { PeerAgent } from './types.js';

const ScheduleSummarySchema = z.object({
    availableSlots: z.array(z.string()).default([]),
    message: z.string().default(''),
});

/** Equipment the plan needs, in first-seen order */
export function requiredEquipment(input: ValidationInput): string[] {
    return [...new Set(input.workout.exercises.flatMap((exercise) => exercise.equipment))];
}

export function buildValidationMessage(input: ValidationInput): Message {
    const { workout } = input;
    let text = `Validate this workout: ${workout.name} (${workout.estimatedDuration} min)`;
    const equipment = requiredEquipment(input);
    if (equipment.length > 0) {
        text += `. Equipment needed: ${equipment.join(', ')}`;
    }

    return createMessage('user', [
        createTextPart(text),
        createDataPart({
            workout,
            ...(input.date !== undefined && { date: input.date }),
            location: input.location ?? 'home',
        }),
    ]);
}

/**
 * Reads the `analysis` (and optional `schedule`) data of a validator reply.
 */
export function readValidatorReply(message: Message): ValidatorReply {
    const part = findDataPart(message, 'analysis');
    if (!part) {
        throw OrchestrationError.invalidRoleReply('validator', 'no analysis data part');
    }
    const analysis = ConflictAnalysisSchema.safeParse(part.data.analysis);
    if (!analysis.success) {
        throw OrchestrationError.invalidRoleReply(
            'validator',
            `malformed analysis: ${analysis.error.issues[0]?.message ?? 'unknown issue'}`
        );
    }

    const schedule = ScheduleSummarySchema.safeParse(part.data.schedule);
    return {
        analysis: analysis.data,
        ...(schedule.success && { schedule: schedule.data }),
    };
}

/**
 * Validator role over an A2A peer ("life-sync").
 */
export class ValidatorRole implements WorkoutValidator {
    constructor(private readonly agent: PeerAgent) {}

    async validate(input: ValidationInput): Promise<ValidatorReply> {
        const reply = await this.agent.send(buildValidationMessage(input), {
            taskIdPrefix: 'validate-',
        });
        return readValidatorReply(reply);
    }
}
