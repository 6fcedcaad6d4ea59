/**
 * A2A JSON-RPC HTTP Endpoint
 *
 * POST / accepts a JSON-RPC request and answers with a JSON-RPC envelope, or
 * with an SSE stream for tasks/sendSubscribe.
 *
 * Example request:
 * ```json
 * POST /
 * Content-Type: application/json
 *
 * {
 *   "jsonrpc": "2.0",
 *   "id": "req-1",
 *   "method": "tasks/send",
 *   "params": {
 *     "task": {
 *       "id": "workout-1a2b3c4d",
 *       "message": { "role": "user", "parts": [{ "type": "text", "text": "30 min core" }] }
 *     }
 *   }
 * }
 * ```
 */

import { Hono } from 'hono';
import type { Logger } from '@pacer/core';
import { A2AErrorCode, createErrorResponse, toErrorMessage } from '@pacer/core';
import type { A2ADispatcher } from '../../a2a/dispatcher.js';
import { SSE_HEADERS, createTaskSSEStream } from '../../events/task-sse-stream.js';

export function createA2AJsonRpcRouter(dispatcher: A2ADispatcher, logger: Logger) {
    const app = new Hono();

    app.post('/', async (ctx) => {
        let body: unknown;
        try {
            body = await ctx.req.json();
        } catch (error) {
            logger.warn(`Rejected unparseable JSON-RPC body: ${toErrorMessage(error)}`);
            return ctx.json(
                createErrorResponse(null, A2AErrorCode.PARSE_ERROR, 'Parse error', {
                    error: toErrorMessage(error),
                })
            );
        }

        const outcome = await dispatcher.dispatch(body);
        if (outcome.kind === 'response') {
            return ctx.json(outcome.response);
        }

        logger.info(`SSE stream opened for task ${outcome.taskId}`);
        return new Response(createTaskSSEStream(outcome.taskId, outcome.events, logger), {
            headers: SSE_HEADERS,
        });
    });

    return app;
}
