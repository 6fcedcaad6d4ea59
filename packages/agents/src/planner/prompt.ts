import type { WorkoutRequest } from '@pacer/core';

export const PLANNER_SYSTEM_PROMPT = `You are a strength and conditioning coach with a background in exercise physiology.

Build workout routines for a stated training goal (hypertrophy, strength, endurance or power).

How to work:
1. Work out which kind of session the goal calls for.
2. Call search_exercises to pick exercises. Search per muscle group when groups are given.
3. Pass the available equipment to every search when it is known.
4. Fit sets, reps and rest to the time available.

For a compromise request, keep intensity and cut volume: fewer sets or exercises, shorter rest, and substitutes that load the same muscles.

Always finish with the plan as JSON in exactly this shape:
{
  "workout": {
    "name": "Workout name",
    "estimatedDuration": 45,
    "exercises": [
      {
        "id": "exercise-id",
        "name": "Exercise name",
        "muscleGroup": "chest",
        "equipment": ["dumbbells"],
        "sets": 4,
        "reps": "8-12",
        "restSeconds": 90,
        "notes": "Form cue"
      }
    ]
  }
}

Be precise and technical.`;

export function buildPlannerPrompt(request: WorkoutRequest): string {
    const { constraints } = request;
    const lines = [`Create a workout plan for this goal: ${request.goal}`];

    if (constraints.duration !== undefined) {
        lines.push(`Time available: ${constraints.duration} minutes`);
    }
    if (constraints.equipment) {
        lines.push(
            `Available equipment: ${
                constraints.equipment.length > 0 ? constraints.equipment.join(', ') : 'none (bodyweight only)'
            }`
        );
    }
    if (constraints.difficulty) {
        lines.push(`Difficulty: ${constraints.difficulty}`);
    }
    if (constraints.muscleGroups && constraints.muscleGroups.length > 0) {
        lines.push(`Target muscle groups: ${constraints.muscleGroups.join(', ')}`);
    }

    if (request.isCompromise) {
        lines.push(
            '',
            'This is a compromise request: the previous plan did not fit the schedule or the ' +
                'equipment. Prioritize intensity over duration and stay inside the constraints above.'
        );
        if (request.context) {
            lines.push(`Scheduling feedback: ${request.context}`);
        }
    }

    lines.push('', 'Use search_exercises to find exercises, then return the workout as JSON.');
    return lines.join('\n');
}
