import { describe, it, expect } from 'vitest';
import { createDataPart, createMessage, createTextPart } from '@pacer/core';
import { parseFromText, parseWorkoutRequest } from './request-parser.js';

describe('parseFromText', () => {
    it('extracts duration, equipment and muscle groups', () => {
        const request = parseFromText('45 min upper body hypertrophy workout at home with dumbbells');

        expect(request.constraints).toEqual({
            duration: 45,
            equipment: ['dumbbell'],
            muscleGroups: ['upper body'],
        });
        expect(request.isCompromise).toBe(false);
        expect(request.goal).toBe('45 min upper body hypertrophy workout at home with dumbbells');
    });

    it('needs a number directly before "min"', () => {
        expect(parseFromText('45-minute session').constraints.duration).toBeUndefined();
    });

    it('matches keywords case-insensitively and joins multi-word equipment', () => {
        const request = parseFromText('Chest day, 30 MIN, Resistance Band and kettlebell');

        expect(request.constraints).toEqual({
            duration: 30,
            equipment: ['resistance_band', 'kettlebell'],
            muscleGroups: ['chest'],
        });
    });

    it('clears equipment for bodyweight or no-equipment requests', () => {
        expect(parseFromText('bodyweight legs').constraints.equipment).toBeUndefined();
        expect(
            parseFromText('no equipment, but I do have a barbell somewhere').constraints.equipment
        ).toBeUndefined();
    });

    it('detects refinement intent from trigger words', () => {
        expect(parseFromText('Please adjust the plan').isCompromise).toBe(true);
        expect(parseFromText('an alternative routine').isCompromise).toBe(true);
        expect(parseFromText('a new routine').isCompromise).toBe(false);
    });
});

describe('parseWorkoutRequest', () => {
    it('joins text parts and parses them when no data part exists', () => {
        const request = parseWorkoutRequest(
            createMessage('user', [createTextPart('20 min'), createTextPart('core')])
        );

        expect(request.goal).toBe('20 min core');
        expect(request.constraints).toEqual({ duration: 20, muscleGroups: ['core'] });
    });

    it('prefers the structured data part', () => {
        const request = parseWorkoutRequest(
            createMessage('user', [
                createTextPart('Create a workout plan: strength (60 min)'),
                createDataPart({
                    goal: 'strength',
                    constraints: { duration: 25, equipment: ['barbell'] },
                    isCompromise: true,
                    context: 'Only 30 minutes free',
                }),
            ])
        );

        expect(request).toEqual({
            goal: 'strength',
            constraints: { duration: 25, equipment: ['barbell'] },
            isCompromise: true,
            context: 'Only 30 minutes free',
        });
    });

    it('falls back to the text when the data part has no goal', () => {
        const request = parseWorkoutRequest(
            createMessage('user', [
                createTextPart('modify my leg day'),
                createDataPart({ constraints: { duration: 0 } }),
            ])
        );

        expect(request.goal).toBe('modify my leg day');
        expect(request.constraints).toEqual({});
        expect(request.isCompromise).toBe(false);
    });
});
