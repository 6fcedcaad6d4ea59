import type { ValidationRequest, Workout } from '@pacer/core';
import { DEFAULT_WORKOUT_MINUTES } from '../tools/calendar.js';

export const DEFAULT_VALIDATION_LOCATION = 'home';

export const VALIDATOR_SYSTEM_PROMPT = `You coordinate logistics for a busy person's training.

Check proposed workouts against real constraints: free time, equipment at the training location and fatigue.

How to work:
1. Call get_calendar_availability with the workout duration to see whether the time exists.
2. Call check_equipment_for_workout (or get_equipment_inventory) to see whether the equipment is there.
3. Flag every conflict you find. Time and equipment conflicts can occur together.

Conflict examples:
- time: "only a 30-minute gap before the evening meeting"
- equipment: "the hotel has no barbell"

Always finish with your analysis as JSON in exactly this shape:
{
  "analysis": {
    "hasConflicts": true,
    "conflicts": [
      {
        "type": "time",
        "severity": "high",
        "message": "What the conflict is",
        "suggestion": "How to work around it"
      }
    ],
    "recommendation": "One-sentence advice for the orchestrator"
  }
}

Use "time", "equipment", "fatigue" or "other" as the type and "high", "medium" or "low" as the severity. Be kind, realistic and brief.`;

export function requiredEquipmentOf(workout: Workout): string[] {
    return [...new Set(workout.exercises.flatMap((exercise) => exercise.equipment))];
}

export function buildValidationPrompt(request: ValidationRequest): string {
    const { workout } = request;
    if (!workout) {
        return (
            request.rawRequest ||
            `Check my availability for a ${DEFAULT_WORKOUT_MINUTES}-minute workout today.`
        );
    }

    const equipment = requiredEquipmentOf(workout);
    const location = request.location ?? DEFAULT_VALIDATION_LOCATION;
    const day = request.date ?? 'today';

    return [
        'Validate this workout plan:',
        '',
        `Workout: ${workout.name}`,
        `Duration: ${workout.estimatedDuration} minutes`,
        `Exercises: ${workout.exercises.length}`,
        `Required equipment: ${equipment.length > 0 ? equipment.join(', ') : 'none (bodyweight)'}`,
        '',
        `1. Check that ${workout.estimatedDuration} free minutes exist on ${day}`,
        `2. Check that the required equipment is available at ${location}`,
        '3. Report every conflict',
        '',
        'Return the analysis JSON with hasConflicts, conflicts and recommendation.',
    ].join('\n');
}
