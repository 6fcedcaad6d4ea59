import { describe, it, expect } from 'vitest';
import { loadExerciseCatalog, searchExercises } from './exercise-catalog.js';
import type { CatalogExercise } from './exercise-catalog.js';

const ids = (criteria: Parameters<typeof searchExercises>[0]) =>
    searchExercises(criteria).map((exercise) => exercise.id);

describe('searchExercises', () => {
    it('loads the bundled catalog', () => {
        const catalog = loadExerciseCatalog();
        expect(catalog.length).toBeGreaterThan(20);
        expect(new Set(catalog.map((exercise) => exercise.id)).size).toBe(catalog.length);
    });

    it('matches muscle groups case-insensitively and caps at five results', () => {
        expect(ids({ muscleGroup: 'Chest' })).toEqual([
            'barbell-bench-press',
            'db-floor-press',
            'db-incline-press',
            'push-up',
            'clap-push-up',
        ]);
    });

    it('honours an explicit limit', () => {
        expect(ids({ muscleGroup: 'chest', limit: 2 })).toEqual([
            'barbell-bench-press',
            'db-floor-press',
        ]);
    });

    it('keeps bodyweight exercises and those covered by the equipment on hand', () => {
        expect(ids({ muscleGroup: 'chest', equipment: ['dumbbells'] })).toEqual([
            'db-floor-press',
            'push-up',
            'clap-push-up',
        ]);
    });

    it('treats an empty equipment list as bodyweight only', () => {
        expect(ids({ muscleGroup: 'legs', equipment: [] })).toEqual([
            'jump-squat',
            'walking-lunge',
        ]);
    });

    it('compares equipment names loosely', () => {
        expect(ids({ muscleGroup: 'arms', equipment: ['Dumbbell'] })).toEqual([
            'db-curl',
            'diamond-push-up',
        ]);
    });

    it('filters by goal type and difficulty', () => {
        expect(ids({ goalType: 'power', limit: 10 })).toEqual([
            'clap-push-up',
            'barbell-push-press',
            'jump-squat',
            'kettlebell-swing',
        ]);
        expect(ids({ difficulty: 'advanced', limit: 10 })).toEqual([
            'clap-push-up',
            'barbell-push-press',
        ]);
    });

    it('maps catalog entries to workout exercises', () => {
        expect(searchExercises({ muscleGroup: 'chest', equipment: [], limit: 1 })).toEqual([
            {
                id: 'push-up',
                name: 'Push-ups',
                muscleGroup: 'chest',
                equipment: [],
                sets: 3,
                reps: '12-20',
                restSeconds: 60,
                notes: 'Body in one line from head to heels',
            },
        ]);
    });

    it('searches a supplied catalog', () => {
        const catalog: CatalogExercise[] = [
            {
                id: 'step-up',
                name: 'Step-ups',
                muscleGroup: 'legs',
                equipment: ['bench'],
                difficulty: 'beginner',
                goalTypes: ['endurance'],
                defaultSets: 2,
                defaultReps: '12',
                restSeconds: 30,
            },
        ];

        expect(searchExercises({ equipment: ['bench'] }, catalog)).toEqual([
            {
                id: 'step-up',
                name: 'Step-ups',
                muscleGroup: 'legs',
                equipment: ['bench'],
                sets: 2,
                reps: '12',
                restSeconds: 30,
            },
        ]);
        expect(searchExercises({ equipment: [] }, catalog)).toEqual([]);
    });
});
