import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';

const HealthSchema = z.object({ status: z.literal('healthy') }).openapi('Health');

const PingSchema = z.object({ status: z.literal('ok') }).openapi('Ping');

const AgentStatusSchema = z
    .object({ status: z.literal('healthy'), agent: z.string() })
    .openapi('AgentStatus');

/**
 * Liveness probes: /health for load balancers, /ping for the managed runtime
 * and GET / for a quick identity check.
 */
export function createHealthRouter(agentName: string) {
    const app = new OpenAPIHono();

    const healthRoute = createRoute({
        method: 'get',
        path: '/health',
        tags: ['system'],
        responses: {
            200: {
                description: 'Server health',
                content: { 'application/json': { schema: HealthSchema } },
            },
        },
    });

    const pingRoute = createRoute({
        method: 'get',
        path: '/ping',
        tags: ['system'],
        responses: {
            200: {
                description: 'Managed runtime health probe',
                content: { 'application/json': { schema: PingSchema } },
            },
        },
    });

    const rootRoute = createRoute({
        method: 'get',
        path: '/',
        tags: ['system'],
        responses: {
            200: {
                description: 'Agent identity and health',
                content: { 'application/json': { schema: AgentStatusSchema } },
            },
        },
    });

    return app
        .openapi(healthRoute, (ctx) => ctx.json({ status: 'healthy' as const }, 200))
        .openapi(pingRoute, (ctx) => ctx.json({ status: 'ok' as const }, 200))
        .openapi(rootRoute, (ctx) => ctx.json({ status: 'healthy' as const, agent: agentName }, 200));
}
