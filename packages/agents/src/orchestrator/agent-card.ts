import type { AgentCard } from '@pacer/core';

export const ORCHESTRATOR_AGENT_NAME = 'orchestrator';

export function createOrchestratorAgentCard(url: string): AgentCard {
    return {
        name: ORCHESTRATOR_AGENT_NAME,
        description:
            'Coordinates the workout planner and the schedule validator to deliver a plan ' +
            'that fits the day',
        url,
        version: '1.0.0',
        capabilities: { streaming: true, pushNotifications: false },
        skills: [
            {
                id: 'create-workout',
                name: 'Create Workout',
                description:
                    'Plan a workout for a goal and check it against the calendar and equipment',
            },
            {
                id: 'adaptive-planning',
                name: 'Adaptive Planning',
                description:
                    'Ask the planner for a compromise when the first plan conflicts with ' +
                    'time or equipment',
            },
        ],
    };
}
