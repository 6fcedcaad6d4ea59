import { describe, it, expect, vi } from 'vitest';
import { createMessage, createTextPart, findDataPart, parseEnvironment } from '@pacer/core';
import type { Message, Workout } from '@pacer/core';
import { createSilentMockLogger } from '@pacer/core/test-utils';
import { A2AClient } from '@pacer/client-sdk';
import type { FetchInit, FetchInput } from '@pacer/client-sdk';
import { createA2AApp } from '@pacer/server';
import type { AgentCapability } from '@pacer/server';
import { createPlannerAgentCard } from '../planner/agent-card.js';
import { PlannerCapability } from '../planner/planner-capability.js';
import { createValidatorAgentCard } from '../validator/agent-card.js';
import { ValidatorCapability } from '../validator/validator-capability.js';
import { ScriptedModel } from '../test-model.js';
import { createOrchestratorAgentCard } from './agent-card.js';
import { createOrchestratorCapability, createPeerClients } from './create-orchestrator.js';

const logger = createSilentMockLogger();

describe('createPeerClients', () => {
    it('uses direct HTTP for URLs', () => {
        const { planner, validator } = createPeerClients({ env: parseEnvironment({}), logger });

        expect(planner.peer).toBe('biomechanics-lab');
        expect(planner.transportKind).toBe('http');
        expect(validator.peer).toBe('life-sync');
        expect(validator.transportKind).toBe('http');
    });

    it('uses managed invocation when a runtime ARN is configured', () => {
        const env = parseEnvironment({
            BIOMECHANICS_ARN:
                'arn:aws:bedrock-agentcore:us-east-1:123456789012:runtime/biomechanics-test',
        });

        const { planner, validator } = createPeerClients({
            env,
            logger,
            clients: { agentCoreInvoker: { invoke: async () => '{}' } },
        });

        expect(planner.transportKind).toBe('agentcore');
        expect(validator.transportKind).toBe('http');
    });
});

describe('orchestrator agent end to end', () => {
    const workout: Workout = {
        name: 'Leg Builder',
        estimatedDuration: 60,
        exercises: [
            {
                id: 'goblet-squat',
                name: 'Goblet Squat',
                muscleGroup: 'legs',
                equipment: ['dumbbells'],
                sets: 4,
                reps: '10-15',
                restSeconds: 60,
            },
        ],
    };
    const analysis = {
        hasConflicts: true,
        conflicts: [
            {
                type: 'time',
                severity: 'high',
                message: 'Only 40 minutes before work',
                suggestion: 'Plan a 30-40 minute session',
            },
        ],
        recommendation: 'Shorten the workout to 40 minutes.',
    };

    function buildStack() {
        const env = parseEnvironment({});
        const plannerModel = new ScriptedModel(JSON.stringify({ workout }));
        const validatorModel = new ScriptedModel(JSON.stringify({ analysis }));

        const plannerApp = createA2AApp({
            agentCard: createPlannerAgentCard(env.BIOMECHANICS_URL),
            capability: new PlannerCapability({ model: plannerModel, logger }),
            logger,
        });
        const validatorApp = createA2AApp({
            agentCard: createValidatorAgentCard(env.LIFESYNC_URL),
            capability: new ValidatorCapability({
                model: validatorModel,
                logger,
                schedules: {
                    weekday: [
                        { start: '06:00', end: '06:40', available: true },
                        { start: '06:40', end: '19:00', available: false },
                    ],
                },
            }),
            logger,
        });

        const route = async (input: FetchInput, init?: FetchInit) => {
            const url = input instanceof Request ? input.url : input.toString();
            const app = url.startsWith(env.BIOMECHANICS_URL) ? plannerApp : validatorApp;
            return app.request(input, init);
        };

        const orchestratorApp = createA2AApp({
            agentCard: createOrchestratorAgentCard('http://orchestrator.test'),
            capability: createOrchestratorCapability({
                env,
                logger,
                clients: { fetch: route, sleep: async () => {} },
            }),
            logger,
        });
        const client = new A2AClient({
            destination: 'http://orchestrator.test/',
            peer: 'orchestrator',
            logger,
            fetch: async (input, init) => orchestratorApp.request(input, init),
        });

        return { client, plannerModel, validatorModel };
    }

    it('validates, refines and returns the compromise plan', async () => {
        const { client, plannerModel, validatorModel } = buildStack();

        const result = await client.send(
            createMessage('user', [createTextPart('60 min leg workout with dumbbells')])
        );

        expect(findDataPart(result)?.data).toEqual({
            workout,
            analysis,
            hasConflicts: true,
            isCompromise: true,
            schedule: {
                availableSlots: ['06:00-06:40'],
                message:
                    'Limited availability. Maximum continuous free time is 40 minutes. ' +
                    'Consider a shorter workout.',
            },
        });

        expect(plannerModel.requests).toHaveLength(2);
        expect(validatorModel.requests).toHaveLength(1);
        const compromisePrompt = plannerModel.requests[1]?.prompt ?? '';
        expect(compromisePrompt).toContain('Time available: 40 minutes');
        expect(compromisePrompt).toContain(
            'Scheduling feedback: Shorten the workout to 40 minutes.'
        );
    });

    it('serves all three agent cards', async () => {
        const { client } = buildStack();

        const card = await client.getAgentCard();

        expect(card.name).toBe('orchestrator');
        expect(card.skills.map((skill) => skill.id)).toEqual([
            'create-workout',
            'adaptive-planning',
        ]);
        expect(createPlannerAgentCard('http://localhost:8082').skills.map((s) => s.id)).toEqual([
            'create-workout',
            'modify-workout',
        ]);
        expect(createValidatorAgentCard('http://localhost:8083').skills.map((s) => s.id)).toEqual(
            ['validate-schedule', 'check-equipment']
        );
    });
});

describe('peer calls that time out', () => {
    const reply = createMessage('assistant', [createTextPart('Here is your plan')]);
    const request = createMessage('user', [createTextPart('leg day at home')]);

    // The first task stalls until released; later tasks answer at once.
    function buildSlowPeer() {
        const taskIds: string[] = [];
        let releaseFirst: () => void = () => {};
        const firstHeld = new Promise<void>((resolve) => {
            releaseFirst = resolve;
        });
        const capability: AgentCapability = {
            execute: async (_message, context): Promise<Message> => {
                taskIds.push(context.taskId);
                if (taskIds.length === 1) {
                    await firstHeld;
                }
                return reply;
            },
        };
        const app = createA2AApp({
            agentCard: createPlannerAgentCard('http://planner.test'),
            capability,
            logger,
        });

        // app.request ignores the abort signal, so reject on abort like a real fetch
        const fetch = (input: FetchInput, init?: FetchInit) =>
            new Promise<Response>((resolve, reject) => {
                init?.signal?.addEventListener(
                    'abort',
                    () => reject(new Error('request aborted')),
                    { once: true }
                );
                Promise.resolve(app.request(input, init)).then(resolve, reject);
            });

        const client = new A2AClient({
            destination: 'http://planner.test/',
            peer: 'biomechanics-lab',
            logger,
            timeoutMs: 50,
            sleep: async () => {},
            fetch,
        });
        return { client, taskIds, releaseFirst };
    }

    it('retries send under a fresh task id', async () => {
        const { client, taskIds, releaseFirst } = buildSlowPeer();

        await expect(client.send(request, { taskIdPrefix: 'workout-' })).resolves.toEqual(reply);

        expect(taskIds).toHaveLength(2);
        expect(taskIds[0]).toMatch(/^workout-[0-9a-f]{8}$/);
        expect(taskIds[1]).toMatch(/^workout-[0-9a-f]{8}$/);
        expect(taskIds[1]).not.toBe(taskIds[0]);

        releaseFirst();
        await vi.waitFor(async () => {
            expect((await client.getTask(taskIds[0] ?? '')).status).toBe('completed');
        });
    });

    it('retries sendTask under an id derived from the requested one', async () => {
        const { client, taskIds, releaseFirst } = buildSlowPeer();

        const view = await client.sendTask('slow-1', request);

        expect(view.status).toBe('completed');
        expect(view.taskId).toMatch(/^slow-1-[0-9a-f]{8}$/);
        expect(taskIds).toEqual(['slow-1', view.taskId]);
        releaseFirst();
    });
});
