import { tool } from 'ai';
import type { ToolSet } from 'ai';
import { z } from 'zod';
import { DifficultySchema, GoalTypeSchema } from '@pacer/core';
import type { Logger } from '@pacer/core';
import { DEFAULT_SEARCH_LIMIT, searchExercises } from '../tools/exercise-catalog.js';
import type { CatalogExercise } from '../tools/exercise-catalog.js';

export const SearchExercisesInputSchema = z.object({
    muscleGroup: z
        .string()
        .optional()
        .describe('Target muscle group, e.g. chest, back, shoulders, arms, legs, core'),
    goalType: GoalTypeSchema.optional().describe('Training goal the exercise should serve'),
    difficulty: DifficultySchema.optional(),
    equipment: z
        .array(z.string())
        .optional()
        .describe('Equipment on hand. Bodyweight exercises always match'),
    limit: z
        .number()
        .int()
        .positive()
        .max(20)
        .optional()
        .describe(`Maximum results (default ${DEFAULT_SEARCH_LIMIT})`),
});

export interface PlannerToolsOptions {
    logger: Logger;
    /** Replaces the bundled catalog */
    catalog?: CatalogExercise[];
}

export function createPlannerTools(options: PlannerToolsOptions): ToolSet {
    const { logger, catalog } = options;
    return {
        search_exercises: tool({
            description:
                'Search the exercise catalog by muscle group, goal type, difficulty and ' +
                'available equipment. Returns exercises with default sets, reps and rest.',
            inputSchema: SearchExercisesInputSchema,
            execute: async (input) => {
                const exercises = searchExercises(input, catalog);
                logger.debug(`search_exercises returned ${exercises.length} exercises`, { input });
                return { count: exercises.length, exercises };
            },
        }),
    };
}
