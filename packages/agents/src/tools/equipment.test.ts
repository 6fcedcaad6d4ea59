import { describe, it, expect } from 'vitest';
import {
    checkEquipmentForWorkout,
    getEquipmentInventory,
    normalizeEquipment,
    resolveLocation,
} from './equipment.js';

describe('resolveLocation', () => {
    it('maps aliases and names case-insensitively', () => {
        expect(resolveLocation('Fitness Center')).toBe('gym');
        expect(resolveLocation('apartment')).toBe('home');
        expect(resolveLocation('HOTEL')).toBe('hotel');
        expect(resolveLocation(' outdoors ')).toBe('park');
    });

    it('defaults to home when no location is given', () => {
        expect(resolveLocation(undefined)).toBe('home');
        expect(resolveLocation('  ')).toBe('home');
    });

    it('treats unknown places as traveling', () => {
        expect(resolveLocation('grandma’s cabin')).toBe('traveling');
    });
});

describe('getEquipmentInventory', () => {
    it('reports the resolved location and the name that was asked for', () => {
        const inventory = getEquipmentInventory('apartment');

        expect(inventory.location).toBe('home');
        expect(inventory.requestedLocation).toBe('apartment');
        expect(inventory.available).toContain('dumbbells');
        expect(inventory.missing).toContain('barbell');
    });

    it('omits the requested name when it is the location itself', () => {
        expect(getEquipmentInventory('gym')).not.toHaveProperty('requestedLocation');
    });
});

describe('checkEquipmentForWorkout', () => {
    it('lists missing equipment', () => {
        expect(checkEquipmentForWorkout(['dumbbells', 'barbell'], 'home')).toEqual({
            feasible: false,
            location: 'home',
            availableEquipment: ['dumbbells'],
            missingEquipment: ['barbell'],
            recommendation:
                'Missing equipment: barbell. Consider alternatives or a different location.',
        });
    });

    it('accepts loosely written names', () => {
        const check = checkEquipmentForWorkout(['Dumbbell', 'pullup bar'], 'house');

        expect(check.feasible).toBe(true);
        expect(check.recommendation).toBe('All required equipment is available.');
    });

    it('is always feasible for bodyweight workouts', () => {
        expect(checkEquipmentForWorkout([], 'office').feasible).toBe(true);
    });
});

describe('normalizeEquipment', () => {
    it('lower-cases, joins words and drops a plural s', () => {
        expect(normalizeEquipment('Resistance Bands')).toBe('resistance_band');
        expect(normalizeEquipment('pull-up bar')).toBe('pull_up_bar');
    });
});
