/**
 * Lenient schemas for fitness payloads exchanged between agents.
 *
 * Payloads come from peer agents and from model output, so missing fields
 * take defaults instead of failing the whole message.
 */

import { z } from 'zod';

export const DifficultySchema = z.enum(['beginner', 'intermediate', 'advanced']);

export const GoalTypeSchema = z.enum(['hypertrophy', 'strength', 'endurance', 'power']);

export const WorkoutConstraintsSchema = z.object({
    duration: z.number().nonnegative().optional(),
    equipment: z.array(z.string()).optional(),
    difficulty: DifficultySchema.optional(),
    muscleGroups: z.array(z.string()).optional(),
});

export const WorkoutExerciseSchema = z.object({
    id: z.string().default(''),
    name: z.string(),
    muscleGroup: z.string().default('full body'),
    equipment: z.array(z.string()).default([]),
    sets: z.number().int().nonnegative().default(3),
    reps: z.union([z.string(), z.number().transform(String)]).default('10'),
    restSeconds: z.number().nonnegative().default(60),
    notes: z.string().optional(),
});

export const WorkoutSchema = z.object({
    name: z.string().default('Unnamed Workout'),
    estimatedDuration: z.number().positive().default(60),
    exercises: z.array(WorkoutExerciseSchema).default([]),
});

export const ConflictSchema = z.object({
    type: z.enum(['time', 'equipment', 'fatigue', 'other']).catch('other'),
    severity: z.enum(['high', 'medium', 'low']).catch('medium'),
    message: z.string().default(''),
    suggestion: z.string().default(''),
});

export const ConflictAnalysisSchema = z.object({
    hasConflicts: z.boolean().default(false),
    conflicts: z.array(ConflictSchema).default([]),
    recommendation: z.string().default(''),
});

/**
 * Structured data part sent to the planner.
 */
export const PlannerDataSchema = z.object({
    goal: z.string().optional(),
    constraints: WorkoutConstraintsSchema.optional(),
    isCompromise: z.boolean().optional(),
    context: z.string().optional(),
});

/**
 * Structured data part sent to the validator.
 */
export const ValidatorDataSchema = z.object({
    workout: WorkoutSchema.optional(),
    date: z.string().optional(),
    location: z.string().optional(),
});
