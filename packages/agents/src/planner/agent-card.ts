import type { AgentCard } from '@pacer/core';

export const PLANNER_AGENT_NAME = 'biomechanics-lab';

export function createPlannerAgentCard(url: string): AgentCard {
    return {
        name: PLANNER_AGENT_NAME,
        description:
            'Exercise physiology agent that designs structured workouts for hypertrophy, ' +
            'strength, endurance and power goals',
        url,
        version: '1.0.0',
        capabilities: { streaming: true, pushNotifications: false },
        skills: [
            {
                id: 'create-workout',
                name: 'Create Workout Plan',
                description:
                    'Build a workout from a goal, time budget, equipment, difficulty and ' +
                    'target muscle groups',
            },
            {
                id: 'modify-workout',
                name: 'Modify Workout Plan',
                description:
                    'Produce a compromise plan that keeps intensity when time or equipment is short',
            },
        ],
    };
}
