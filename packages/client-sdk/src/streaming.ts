import { z } from 'zod';
import { MessageSchema, TASK_EVENT_NAMES, TaskStatus, isTerminalEvent } from '@pacer/core';
import type { TaskStreamEvent } from '@pacer/core';
import { ClientError } from './errors.js';
import type { FetchResponse } from './transports/types.js';

/**
 * SSE (Server-Sent Events) reading for task subscriptions
 */

export interface SSEEvent {
    event?: string;
    data?: string;
    id?: string;
    retry?: number;
}

/**
 * Yield raw SSE events from a streaming response body.
 *
 * @param response The fetch Response holding the event stream
 * @param options Optional AbortSignal; aborting ends the generator quietly
 */
export async function* stream(
    response: FetchResponse,
    options?: { signal?: AbortSignal | undefined }
): AsyncGenerator<SSEEvent> {
    const reader = response.body?.getReader();
    if (!reader) {
        throw new Error('Response body is null');
    }

    const decoder = new TextDecoder();
    let buffer = '';
    const signal = options?.signal;

    let aborted = false;
    const abortHandler = () => {
        aborted = true;
        void reader.cancel().catch(() => undefined);
    };

    if (signal) {
        if (signal.aborted) {
            await reader.cancel().catch(() => undefined);
            return;
        }
        signal.addEventListener('abort', abortHandler);
    }

    try {
        while (true) {
            if (aborted) {
                return;
            }

            const boundary = buffer.indexOf('\n\n');
            if (boundary !== -1) {
                const eventString = buffer.slice(0, boundary);
                buffer = buffer.slice(boundary + 2);

                const event = parseSSE(eventString);
                if (event) {
                    yield event;
                }
                continue;
            }

            const { done, value } = await reader.read();
            if (done) {
                if (buffer.trim()) {
                    const event = parseSSE(buffer);
                    if (event) {
                        yield event;
                    }
                }
                return;
            }

            // Normalize CRLF to LF
            buffer += decoder.decode(value, { stream: true }).replace(/\r\n/g, '\n');
        }
    } finally {
        signal?.removeEventListener('abort', abortHandler);
        await reader.cancel().catch(() => undefined);
    }
}

export function parseSSE(raw: string): SSEEvent | null {
    const lines = raw.split('\n').map((line) => line.replace(/\r$/, ''));
    const event: SSEEvent = {};
    let hasData = false;

    for (const line of lines) {
        if (line.startsWith(':')) continue; // Comment

        if (line.startsWith('data: ')) {
            const data = line.slice(6);
            event.data = event.data !== undefined ? event.data + '\n' + data : data;
            hasData = true;
        } else if (line.startsWith('event: ')) {
            event.event = line.slice(7);
        } else if (line.startsWith('id: ')) {
            event.id = line.slice(4);
        } else if (line.startsWith('retry: ')) {
            event.retry = parseInt(line.slice(7), 10);
        }
    }

    if (!hasData && !event.event && !event.id) return null;
    return event;
}

const StatusPayloadSchema = z.object({
    taskId: z.string(),
    status: z.literal(TaskStatus.WORKING),
    message: z.string(),
});

const ChunkPayloadSchema = z.object({
    taskId: z.string(),
    chunk: z.string(),
});

const ResultPayloadSchema = z.object({
    taskId: z.string(),
    status: z.literal(TaskStatus.COMPLETED),
    result: MessageSchema,
});

const ErrorPayloadSchema = z.object({
    taskId: z.string(),
    status: z.literal(TaskStatus.FAILED),
    error: z.string(),
});

function parsePayload<T>(peer: string, schema: z.ZodType<T>, event: SSEEvent): T {
    let raw: unknown;
    try {
        raw = JSON.parse(event.data ?? '');
    } catch (error) {
        throw ClientError.invalidResponse(peer, `${event.event} event data is not JSON`, error);
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
        throw ClientError.invalidResponse(peer, `malformed ${event.event} event`, result.error);
    }
    return result.data;
}

/**
 * Decode a task SSE event. Event names outside the task vocabulary yield undefined.
 */
export function toTaskStreamEvent(peer: string, event: SSEEvent): TaskStreamEvent | undefined {
    switch (event.event) {
        case TASK_EVENT_NAMES.status:
            return { type: 'status', ...parsePayload(peer, StatusPayloadSchema, event) };
        case TASK_EVENT_NAMES.chunk:
            return { type: 'chunk', ...parsePayload(peer, ChunkPayloadSchema, event) };
        case TASK_EVENT_NAMES.result:
            return { type: 'result', ...parsePayload(peer, ResultPayloadSchema, event) };
        case TASK_EVENT_NAMES.error:
            return { type: 'error', ...parsePayload(peer, ErrorPayloadSchema, event) };
        default:
            return undefined;
    }
}

/**
 * Typed task events from a tasks/sendSubscribe response. Ends after the
 * terminal event; a stream that closes before one is an invalid response.
 */
export async function* readTaskEvents(
    peer: string,
    response: FetchResponse,
    options?: { signal?: AbortSignal | undefined }
): AsyncGenerator<TaskStreamEvent> {
    for await (const sse of stream(response, options)) {
        const event = toTaskStreamEvent(peer, sse);
        if (!event) {
            continue;
        }
        yield event;
        if (isTerminalEvent(event)) {
            return;
        }
    }
    if (!options?.signal?.aborted) {
        throw ClientError.invalidResponse(peer, 'event stream ended without a terminal event');
    }
}
