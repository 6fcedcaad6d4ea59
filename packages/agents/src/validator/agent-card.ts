import type { AgentCard } from '@pacer/core';

export const VALIDATOR_AGENT_NAME = 'life-sync';

export function createValidatorAgentCard(url: string): AgentCard {
    return {
        name: VALIDATOR_AGENT_NAME,
        description:
            'Logistics agent that checks workout plans against the calendar and the ' +
            'equipment at the training location',
        url,
        version: '1.0.0',
        capabilities: { streaming: true, pushNotifications: false },
        skills: [
            {
                id: 'validate-schedule',
                name: 'Validate Schedule',
                description: 'Check that the workout fits into the free time on a given day',
            },
            {
                id: 'check-equipment',
                name: 'Check Equipment',
                description: 'Check that the training location has the equipment a workout needs',
            },
        ],
    };
}
