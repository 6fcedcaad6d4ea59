/**
 * Mocked exercise catalog searched by the planner's model.
 */

import { z } from 'zod';
import { DifficultySchema, GoalTypeSchema } from '@pacer/core';
import type { Difficulty, GoalType, WorkoutExercise } from '@pacer/core';
import { loadDataFile } from './data.js';
import { normalizeEquipment } from './equipment.js';

export const CatalogExerciseSchema = z.object({
    id: z.string(),
    name: z.string(),
    muscleGroup: z.string(),
    /** Empty for bodyweight exercises */
    equipment: z.array(z.string()),
    difficulty: DifficultySchema,
    goalTypes: z.array(GoalTypeSchema),
    defaultSets: z.number().int().positive(),
    defaultReps: z.string(),
    restSeconds: z.number().int().nonnegative(),
    notes: z.string().optional(),
});

export type CatalogExercise = z.output<typeof CatalogExerciseSchema>;

export interface ExerciseSearchCriteria {
    muscleGroup?: string | undefined;
    goalType?: GoalType | undefined;
    difficulty?: Difficulty | undefined;
    /** Equipment on hand; when given, only exercises it covers match */
    equipment?: string[] | undefined;
    limit?: number | undefined;
}

export const DEFAULT_SEARCH_LIMIT = 5;

let cached: CatalogExercise[] | undefined;

export function loadExerciseCatalog(): CatalogExercise[] {
    cached ??= loadDataFile('exercises.json', z.array(CatalogExerciseSchema));
    return cached;
}

function matches(exercise: CatalogExercise, criteria: ExerciseSearchCriteria): boolean {
    if (criteria.muscleGroup) {
        const wanted = criteria.muscleGroup.trim().toLowerCase();
        if (!exercise.muscleGroup.toLowerCase().includes(wanted)) {
            return false;
        }
    }
    if (criteria.goalType && !exercise.goalTypes.includes(criteria.goalType)) {
        return false;
    }
    if (criteria.difficulty && exercise.difficulty !== criteria.difficulty) {
        return false;
    }
    if (criteria.equipment) {
        const onHand = new Set(criteria.equipment.map(normalizeEquipment));
        return exercise.equipment.every((item) => onHand.has(normalizeEquipment(item)));
    }
    return true;
}

export function toWorkoutExercise(exercise: CatalogExercise): WorkoutExercise {
    return {
        id: exercise.id,
        name: exercise.name,
        muscleGroup: exercise.muscleGroup,
        equipment: [...exercise.equipment],
        sets: exercise.defaultSets,
        reps: exercise.defaultReps,
        restSeconds: exercise.restSeconds,
        ...(exercise.notes !== undefined && { notes: exercise.notes }),
    };
}

/**
 * Catalog entries matching every given criterion, in catalog order.
 */
export function searchExercises(
    criteria: ExerciseSearchCriteria,
    catalog: CatalogExercise[] = loadExerciseCatalog()
): WorkoutExercise[] {
    const limit = criteria.limit ?? DEFAULT_SEARCH_LIMIT;
    return catalog
        .filter((exercise) => matches(exercise, criteria))
        .slice(0, limit)
        .map(toWorkoutExercise);
}
