import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';
import type { AgentCard } from '@pacer/core';

const AgentSkillSchema = z
    .object({ id: z.string(), name: z.string(), description: z.string() })
    .openapi('AgentSkill');

const AgentCardResponseSchema = z
    .object({
        name: z.string().openapi({ example: 'biomechanics-lab' }),
        description: z.string(),
        url: z.string().openapi({ example: 'http://localhost:8082' }),
        version: z.string(),
        capabilities: z.object({
            streaming: z.boolean(),
            pushNotifications: z.boolean(),
        }),
        skills: z.array(AgentSkillSchema),
    })
    .openapi('AgentCard');

/**
 * Agent discovery: the static card at /.well-known/agent.json.
 */
export function createA2aRouter(getAgentCard: () => AgentCard) {
    const app = new OpenAPIHono();

    const agentCardRoute = createRoute({
        method: 'get',
        path: '/.well-known/agent.json',
        tags: ['a2a'],
        responses: {
            200: {
                description: 'Agent card with name, endpoint, capabilities and skills',
                content: { 'application/json': { schema: AgentCardResponseSchema } },
            },
        },
    });

    return app.openapi(agentCardRoute, (ctx) => ctx.json(getAgentCard(), 200));
}
