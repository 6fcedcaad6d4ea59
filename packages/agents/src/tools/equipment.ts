/**
 * Mocked equipment inventory per training location.
 */

import { z } from 'zod';
import { loadDataFile } from './data.js';

const InventorySchema = z.object({
    available: z.array(z.string()),
    missing: z.array(z.string()),
});

export const LocationDataSchema = z.object({
    defaultLocation: z.string(),
    fallbackLocation: z.string(),
    aliases: z.record(z.string()),
    locations: z.record(InventorySchema),
});

export type LocationData = z.output<typeof LocationDataSchema>;

export interface EquipmentInventory {
    /** Resolved location name */
    location: string;
    /** What the caller asked for, when it differs from `location` */
    requestedLocation?: string;
    available: string[];
    missing: string[];
}

export interface EquipmentCheck {
    feasible: boolean;
    location: string;
    availableEquipment: string[];
    missingEquipment: string[];
    recommendation: string;
}

let cached: LocationData | undefined;

export function loadLocationData(): LocationData {
    cached ??= loadDataFile('locations.json', LocationDataSchema);
    return cached;
}

/**
 * Comparable form of an equipment name: "Dumbbells", "dumbbell" and
 * "DUMBBELL " all become "dumbbell".
 */
export function normalizeEquipment(name: string): string {
    return name
        .trim()
        .toLowerCase()
        .replace(/[\s-]+/g, '_')
        .replace(/s$/, '');
}

/**
 * Map a free-form location to a known one. Empty input means the default
 * location; anything unrecognised is treated as traveling.
 */
export function resolveLocation(location: string | undefined, data = loadLocationData()): string {
    const key = location?.trim().toLowerCase() ?? '';
    if (key === '') {
        return data.defaultLocation;
    }
    const aliased = data.aliases[key] ?? key;
    return aliased in data.locations ? aliased : data.fallbackLocation;
}

export function getEquipmentInventory(
    location: string | undefined,
    data = loadLocationData()
): EquipmentInventory {
    const resolved = resolveLocation(location, data);
    const inventory = data.locations[resolved] ?? { available: [], missing: [] };
    const requested = location?.trim() ?? '';
    const renamed = requested !== '' && requested.toLowerCase() !== resolved;

    return {
        location: resolved,
        ...(renamed ? { requestedLocation: requested } : {}),
        available: [...inventory.available],
        missing: [...inventory.missing],
    };
}

export function checkEquipmentForWorkout(
    required: string[],
    location: string | undefined,
    data = loadLocationData()
): EquipmentCheck {
    const inventory = getEquipmentInventory(location, data);
    const onHand = new Set(inventory.available.map(normalizeEquipment));

    const availableEquipment = required.filter((item) => onHand.has(normalizeEquipment(item)));
    const missingEquipment = required.filter((item) => !onHand.has(normalizeEquipment(item)));
    const feasible = missingEquipment.length === 0;

    return {
        feasible,
        location: inventory.location,
        availableEquipment,
        missingEquipment,
        recommendation: feasible
            ? 'All required equipment is available.'
            : `Missing equipment: ${missingEquipment.join(', ')}. ` +
              'Consider alternatives or a different location.',
    };
}
