import { tool } from 'ai';
import type { ToolSet } from 'ai';
import { z } from 'zod';
import type { Logger } from '@pacer/core';
import { DEFAULT_WORKOUT_MINUTES, getCalendarAvailability } from '../tools/calendar.js';
import type { CalendarOptions } from '../tools/calendar.js';
import { checkEquipmentForWorkout, getEquipmentInventory } from '../tools/equipment.js';

export const CalendarInputSchema = z.object({
    date: z.string().optional().describe('Day to check as YYYY-MM-DD. Defaults to today'),
    durationMinutes: z
        .number()
        .int()
        .positive()
        .optional()
        .describe(`Workout length in minutes (default ${DEFAULT_WORKOUT_MINUTES})`),
});

export const InventoryInputSchema = z.object({
    location: z
        .string()
        .optional()
        .describe('home, gym, hotel, office, park or traveling. Defaults to home'),
});

export const EquipmentCheckInputSchema = z.object({
    requiredEquipment: z.array(z.string()).describe('Equipment the workout needs'),
    location: z.string().optional().describe('Where the workout happens. Defaults to home'),
});

export interface ValidatorToolsOptions extends CalendarOptions {
    logger: Logger;
}

export function createValidatorTools(options: ValidatorToolsOptions): ToolSet {
    const { logger, ...calendar } = options;
    return {
        get_calendar_availability: tool({
            description:
                "Check the user's calendar for free time on a day. Returns free windows, the " +
                'longest continuous free stretch and a recommendation.',
            inputSchema: CalendarInputSchema,
            execute: async (input) => {
                const availability = getCalendarAvailability(input, calendar);
                logger.debug('get_calendar_availability', {
                    date: availability.date,
                    maxContinuousMinutes: availability.maxContinuousMinutes,
                });
                return availability;
            },
        }),
        get_equipment_inventory: tool({
            description: 'List the equipment available and missing at a training location.',
            inputSchema: InventoryInputSchema,
            execute: async ({ location }) => {
                const inventory = getEquipmentInventory(location);
                logger.debug('get_equipment_inventory', { location: inventory.location });
                return inventory;
            },
        }),
        check_equipment_for_workout: tool({
            description:
                'Check whether a location has all the equipment a workout needs. Returns what ' +
                'is missing and a recommendation.',
            inputSchema: EquipmentCheckInputSchema,
            execute: async ({ requiredEquipment, location }) => {
                const check = checkEquipmentForWorkout(requiredEquipment, location);
                logger.debug('check_equipment_for_workout', {
                    location: check.location,
                    feasible: check.feasible,
                });
                return check;
            },
        }),
    };
}
