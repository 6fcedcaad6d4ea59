/**
 * Mocked calendar: one of a few fixed day schedules, picked from the date.
 */

import { z } from 'zod';
import { loadDataFile } from './data.js';

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export const TimeSlotSchema = z.object({
    start: z.string().regex(TIME_PATTERN),
    end: z.string().regex(TIME_PATTERN),
    available: z.boolean(),
    conflictReason: z.string().optional(),
});

export const SchedulesSchema = z.record(z.array(TimeSlotSchema).min(1));

export type TimeSlot = z.output<typeof TimeSlotSchema>;
export type Schedules = z.output<typeof SchedulesSchema>;

export interface AvailabilityQuery {
    /** YYYY-MM-DD; today when absent */
    date?: string | undefined;
    durationMinutes?: number | undefined;
}

export interface CalendarAvailability {
    date: string;
    scheduleName: string;
    slots: TimeSlot[];
    /** Runs of free time as "HH:MM-HH:MM" */
    freeWindows: string[];
    /** Free windows long enough for the workout */
    suitableWindows: string[];
    maxContinuousMinutes: number;
    recommendation: string;
}

export interface CalendarOptions {
    schedules?: Schedules;
    now?: () => Date;
}

export const DEFAULT_WORKOUT_MINUTES = 60;

let cached: Schedules | undefined;

export function loadSchedules(): Schedules {
    cached ??= loadDataFile('schedules.json', SchedulesSchema);
    return cached;
}

function toMinutes(time: string): number {
    const [hours = '0', minutes = '0'] = time.split(':');
    return parseInt(hours, 10) * 60 + parseInt(minutes, 10);
}

function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Stable index into the schedule names for a date string.
 */
export function scheduleIndex(date: string, count: number): number {
    let hash = 0;
    for (const char of date) {
        hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
    }
    return hash % count;
}

interface FreeWindow {
    start: string;
    end: string;
    minutes: number;
}

// Consecutive free slots form one window
function freeWindowsOf(slots: TimeSlot[]): FreeWindow[] {
    const windows: FreeWindow[] = [];
    let current: FreeWindow | undefined;

    for (const slot of slots) {
        if (!slot.available) {
            current = undefined;
            continue;
        }
        const minutes = toMinutes(slot.end) - toMinutes(slot.start);
        if (current) {
            current.end = slot.end;
            current.minutes += minutes;
        } else {
            current = { start: slot.start, end: slot.end, minutes };
            windows.push(current);
        }
    }
    return windows;
}

function recommend(maxContinuous: number, duration: number, suitable: string[]): string {
    if (maxContinuous >= duration) {
        return (
            `You have ${suitable.length} time slot(s) available for a ${duration}-minute ` +
            `workout: ${suitable.join(', ')}`
        );
    }
    if (maxContinuous >= 30) {
        return (
            `Limited availability. Maximum continuous free time is ${maxContinuous} minutes. ` +
            'Consider a shorter workout.'
        );
    }
    if (maxContinuous >= 15) {
        return (
            `Very limited availability. Only ${maxContinuous} minutes free. ` +
            'Consider a quick HIIT session or reschedule.'
        );
    }
    return 'No significant free time available today. Consider rescheduling the workout.';
}

export function getCalendarAvailability(
    query: AvailabilityQuery,
    options: CalendarOptions = {}
): CalendarAvailability {
    const schedules = options.schedules ?? loadSchedules();
    const now = options.now ?? (() => new Date());
    const date = query.date?.trim() || formatDate(now());
    const duration = query.durationMinutes ?? DEFAULT_WORKOUT_MINUTES;

    const names = Object.keys(schedules).sort();
    const scheduleName = names[scheduleIndex(date, names.length)] ?? '';
    const slots = schedules[scheduleName] ?? [];

    const windows = freeWindowsOf(slots);
    const maxContinuousMinutes = windows.reduce((max, window) => Math.max(max, window.minutes), 0);
    const suitableWindows = windows
        .filter((window) => window.minutes >= duration)
        .map((window) => `${window.start}-${window.end}`);

    return {
        date,
        scheduleName,
        slots,
        freeWindows: windows.map((window) => `${window.start}-${window.end}`),
        suitableWindows,
        maxContinuousMinutes,
        recommendation: recommend(maxContinuousMinutes, duration, suitableWindows),
    };
}
