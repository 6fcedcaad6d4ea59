import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { A2AMethod, createRequest } from '@pacer/core';
import { createSilentMockLogger } from '@pacer/core/test-utils';
import { HttpTransport } from './http-transport.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

const request = createRequest('req-1', A2AMethod.GET, { taskId: 'task-1' });

describe('HttpTransport', () => {
    const mockFetch = vi.fn<typeof fetch>();
    let transport: HttpTransport;

    beforeEach(() => {
        vi.stubGlobal('fetch', mockFetch);
        transport = new HttpTransport({
            url: 'http://localhost:8082',
            peer: 'biomechanics',
            timeoutMs: 5000,
            logger: createSilentMockLogger(),
        });
    });

    afterEach(() => {
        mockFetch.mockReset();
        vi.unstubAllGlobals();
    });

    it('POSTs the JSON-RPC request to the endpoint', async () => {
        mockFetch.mockResolvedValueOnce(
            jsonResponse({ jsonrpc: '2.0', id: 'req-1', result: { taskId: 'task-1', status: 'working' } })
        );

        const response = await transport.call(request);

        expect(response).toEqual({
            jsonrpc: '2.0',
            id: 'req-1',
            result: { taskId: 'task-1', status: 'working' },
        });
        expect(mockFetch).toHaveBeenCalledWith(
            'http://localhost:8082',
            expect.objectContaining({
                method: 'POST',
                body: JSON.stringify(request),
                signal: expect.any(AbortSignal),
            })
        );
    });

    it('returns JSON-RPC error envelopes instead of throwing', async () => {
        mockFetch.mockResolvedValueOnce(
            jsonResponse({
                jsonrpc: '2.0',
                id: 'req-1',
                error: { code: -32000, message: 'Task not found: task-1', data: { taskId: 'task-1' } },
            })
        );

        await expect(transport.call(request)).resolves.toEqual({
            jsonrpc: '2.0',
            id: 'req-1',
            error: { code: -32000, message: 'Task not found: task-1', data: { taskId: 'task-1' } },
        });
    });

    it('maps non-2xx statuses to typed failures', async () => {
        mockFetch.mockResolvedValueOnce(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));

        await expect(transport.call(request)).rejects.toMatchObject({
            kind: 'service_unavailable',
            status: 503,
            peer: 'biomechanics',
            data: { body: 'overloaded' },
        });
    });

    it('maps network failures to connection failures', async () => {
        mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

        await expect(transport.call(request)).rejects.toMatchObject({
            kind: 'connection',
            message: '[biomechanics] Failed to connect to http://localhost:8082',
        });
    });

    it('reports a timeout when the peer does not answer in time', async () => {
        vi.useFakeTimers();
        mockFetch.mockImplementationOnce(
            (_input, init) =>
                new Promise((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () =>
                        reject(new DOMException('This operation was aborted', 'AbortError'))
                    );
                })
        );

        const pending = transport.call(request).catch((error: unknown) => error);
        await vi.advanceTimersByTimeAsync(5000);
        vi.useRealTimers();

        await expect(pending).resolves.toMatchObject({
            kind: 'timeout',
            detail: 'Request timed out after 5000ms',
        });
    });

    it('rejects bodies that are not JSON-RPC', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({ hello: 'world' }));

        await expect(transport.call(request)).rejects.toMatchObject({ kind: 'invalid_response' });
    });

    it('rejects bodies that are not JSON', async () => {
        mockFetch.mockResolvedValueOnce(new Response('<html></html>', { status: 200 }));

        await expect(transport.call(request)).rejects.toMatchObject({
            kind: 'invalid_response',
            detail: 'Invalid response: body is not valid JSON',
        });
    });

    it('fetches the agent card from the well-known path', async () => {
        const card = {
            name: 'Biomechanics Lab',
            description: 'Plans workouts',
            url: 'http://localhost:8082',
            version: '1.0.0',
            capabilities: { streaming: true, pushNotifications: false },
            skills: [{ id: 'create-workout', name: 'Create Workout', description: 'Builds a plan' }],
        };
        mockFetch.mockResolvedValueOnce(jsonResponse(card));

        await expect(transport.getAgentCard()).resolves.toEqual(card);
        expect(mockFetch).toHaveBeenCalledWith(
            'http://localhost:8082/.well-known/agent.json',
            expect.objectContaining({ method: 'GET' })
        );
    });
});
