/**
 * Task SSE stream
 *
 * Frames task stream events as Server-Sent Events:
 * event: name\ndata: json\n\n
 */

import type { Logger, TaskStreamEvent } from '@pacer/core';
import { TASK_EVENT_NAMES, toEventPayload } from '@pacer/core';

export const SSE_HEADERS = {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
} as const;

export function formatSSEEvent(event: TaskStreamEvent): string {
    return `event: ${TASK_EVENT_NAMES[event.type]}\ndata: ${JSON.stringify(toEventPayload(event))}\n\n`;
}

/**
 * Pipe an event producer into a byte stream suitable for a Response body.
 * Cancelling the stream (client disconnect) closes the producer.
 */
export function createTaskSSEStream(
    taskId: string,
    events: AsyncGenerator<TaskStreamEvent, void, undefined>,
    logger: Logger
): ReadableStream<Uint8Array> {
    const encoder = new TextEncoder();

    return new ReadableStream<Uint8Array>({
        async pull(controller) {
            try {
                const next = await events.next();
                if (next.done) {
                    controller.close();
                    return;
                }
                controller.enqueue(encoder.encode(formatSSEEvent(next.value)));
            } catch (error) {
                logger.error(`SSE stream for task ${taskId} errored`, {
                    taskId,
                    error: error instanceof Error ? error.message : String(error),
                });
                controller.error(error);
            }
        },

        async cancel() {
            logger.debug(`SSE connection closed for task ${taskId}`);
            await events.return(undefined);
        },
    });
}
