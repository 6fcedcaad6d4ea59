/**
 * Inbound request parsing
 *
 * Turns an A2A message into a WorkoutRequest. A structured data part wins for
 * the fields it carries; otherwise constraints are pulled from the text with a
 * fixed keyword vocabulary. The keyword path is best effort.
 */

import type { Message, WorkoutConstraints, WorkoutRequest } from '@pacer/core';
import { PlannerDataSchema, findDataPart, getTextFromMessage } from '@pacer/core';

const DURATION_PATTERN = /(\d+)\s*min/i;

const EQUIPMENT_KEYWORDS = [
    'dumbbell',
    'barbell',
    'bodyweight',
    'resistance band',
    'kettlebell',
    'cable',
    'machine',
];

const MUSCLE_KEYWORDS = [
    'chest',
    'back',
    'shoulders',
    'arms',
    'legs',
    'core',
    'upper body',
    'lower body',
];

const COMPROMISE_TRIGGERS = ['compromise', 'adjust', 'modify', 'alternative'];

export function parseWorkoutRequest(message: Message): WorkoutRequest {
    const prompt = getTextFromMessage(message);
    const dataPart = findDataPart(message);

    if (dataPart) {
        const parsed = PlannerDataSchema.safeParse(dataPart.data);
        if (parsed.success) {
            const data = parsed.data;
            return {
                goal: data.goal || prompt,
                constraints: normalizeConstraints(data.constraints ?? {}),
                isCompromise: data.isCompromise ?? false,
                ...(data.context !== undefined && { context: data.context }),
            };
        }
    }

    return parseFromText(prompt);
}

export function parseFromText(text: string): WorkoutRequest {
    const lower = text.toLowerCase();

    const durationMatch = DURATION_PATTERN.exec(text);
    const duration = durationMatch?.[1] !== undefined ? parseInt(durationMatch[1], 10) : undefined;

    let equipment = EQUIPMENT_KEYWORDS.filter((keyword) => lower.includes(keyword)).map((keyword) =>
        keyword.replace(' ', '_')
    );
    // No list means bodyweight only
    if (lower.includes('bodyweight') || lower.includes('no equipment')) {
        equipment = [];
    }

    const muscleGroups = MUSCLE_KEYWORDS.filter((keyword) => lower.includes(keyword));

    const constraints: WorkoutConstraints = {};
    if (duration !== undefined) constraints.duration = duration;
    if (equipment.length > 0) constraints.equipment = equipment;
    if (muscleGroups.length > 0) constraints.muscleGroups = muscleGroups;

    return {
        goal: text,
        constraints,
        isCompromise: COMPROMISE_TRIGGERS.some((trigger) => lower.includes(trigger)),
    };
}

// A zero duration means "no time constraint"
function normalizeConstraints(constraints: WorkoutConstraints): WorkoutConstraints {
    const { duration, ...rest } = constraints;
    return duration !== undefined && duration > 0 ? { ...rest, duration } : rest;
}
