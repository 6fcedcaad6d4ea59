import { describe, it, expect } from 'vitest';
import { createDataPart, createMessage, createTextPart, findDataPart } from '@pacer/core';
import type { Message, Workout } from '@pacer/core';
import { createSilentMockLogger } from '@pacer/core/test-utils';
import type { CapabilityUpdate } from '@pacer/server';
import { ScriptedModel } from '../test-model.js';
import { PlannerCapability, readPlannedWorkout } from './planner-capability.js';
import { buildPlannerPrompt } from './prompt.js';

const logger = createSilentMockLogger();
const context = { taskId: 'workout-1a2b3c4d', logger };

const workout: Workout = {
    name: 'Dumbbell Upper Body',
    estimatedDuration: 40,
    exercises: [
        {
            id: 'db-row',
            name: 'One-Arm Dumbbell Row',
            muscleGroup: 'back',
            equipment: ['dumbbells'],
            sets: 3,
            reps: '10-12',
            restSeconds: 60,
        },
    ],
};

const reply = `Based on the catalog:\n${JSON.stringify({ workout })}`;

const request = createMessage('user', [
    createTextPart('Create a workout plan'),
    createDataPart({
        goal: 'upper body hypertrophy',
        constraints: { duration: 40, equipment: ['dumbbells'] },
        isCompromise: false,
    }),
]);

async function drain(
    generator: AsyncGenerator<CapabilityUpdate, Message, undefined>
): Promise<{ updates: CapabilityUpdate[]; result: Message }> {
    const updates: CapabilityUpdate[] = [];
    let next = await generator.next();
    while (!next.done) {
        updates.push(next.value);
        next = await generator.next();
    }
    return { updates, result: next.value };
}

describe('buildPlannerPrompt', () => {
    it('lists every constraint', () => {
        const prompt = buildPlannerPrompt({
            goal: 'strength',
            constraints: {
                duration: 30,
                equipment: [],
                difficulty: 'beginner',
                muscleGroups: ['legs', 'core'],
            },
            isCompromise: false,
        });

        expect(prompt.split('\n')).toEqual([
            'Create a workout plan for this goal: strength',
            'Time available: 30 minutes',
            'Available equipment: none (bodyweight only)',
            'Difficulty: beginner',
            'Target muscle groups: legs, core',
            '',
            'Use search_exercises to find exercises, then return the workout as JSON.',
        ]);
    });

    it('flags compromise requests and carries the feedback', () => {
        const prompt = buildPlannerPrompt({
            goal: 'hypertrophy',
            constraints: { duration: 25 },
            isCompromise: true,
            context: 'Only 25 minutes free',
        });

        expect(prompt).toContain('This is a compromise request');
        expect(prompt).toContain('Prioritize intensity over duration');
        expect(prompt).toContain('Scheduling feedback: Only 25 minutes free');
    });
});

describe('readPlannedWorkout', () => {
    const plain = { goal: 'legs', constraints: { duration: 30 }, isCompromise: false };

    it('reads the workout JSON', () => {
        expect(readPlannedWorkout(reply, plain)).toEqual({ workout });
    });

    it('falls back to an empty custom plan with the reply as reasoning', () => {
        expect(readPlannedWorkout('I could not find exercises.', plain)).toEqual({
            workout: { name: 'Custom Workout', estimatedDuration: 30, exercises: [] },
            reasoning: 'I could not find exercises.',
        });
    });

    it('uses 45 minutes when the request has no duration', () => {
        const planned = readPlannedWorkout('nothing', { ...plain, constraints: {} });
        expect(planned.workout.estimatedDuration).toBe(45);
    });
});

describe('PlannerCapability', () => {
    it('returns a summary and the workout data part', async () => {
        const model = new ScriptedModel(reply);
        const capability = new PlannerCapability({ model, logger });

        const result = await capability.execute(request, context);

        expect(result.parts[0]).toEqual({
            type: 'text',
            text: 'Here is your Dumbbell Upper Body workout plan (40 minutes):',
        });
        expect(findDataPart(result, 'workout')?.data).toEqual({ workout });
    });

    it('prompts the model with the request and the exercise search tool', async () => {
        const model = new ScriptedModel(reply);
        await new PlannerCapability({ model, logger }).execute(request, context);

        const [sent] = model.requests;
        expect(sent?.prompt).toContain('Create a workout plan for this goal: upper body hypertrophy');
        expect(sent?.prompt).toContain('Available equipment: dumbbells');
        expect(Object.keys(sent?.tools ?? {})).toEqual(['search_exercises']);
    });

    it('includes the reasoning when the reply has no plan', async () => {
        const capability = new PlannerCapability({
            model: new ScriptedModel('Sorry, no plan today.'),
            logger,
        });

        const result = await capability.execute(request, context);

        expect(findDataPart(result)?.data).toEqual({
            workout: { name: 'Custom Workout', estimatedDuration: 40, exercises: [] },
            reasoning: 'Sorry, no plan today.',
        });
    });

    it('streams model text as chunks and builds the result from it', async () => {
        const capability = new PlannerCapability({ model: new ScriptedModel(reply, 50), logger });

        const { updates, result } = await drain(capability.stream(request, context));

        expect(updates[0]).toEqual({ type: 'progress', message: 'Designing a workout plan' });
        const chunks = updates.flatMap((update) => (update.type === 'chunk' ? [update.text] : []));
        expect(chunks.join('')).toBe(reply);
        expect(findDataPart(result, 'workout')?.data).toEqual({ workout });
    });

    it('propagates model failures', async () => {
        const capability = new PlannerCapability({
            model: new ScriptedModel(new Error('model offline')),
            logger,
        });

        await expect(capability.execute(request, context)).rejects.toThrow('model offline');
    });
});
