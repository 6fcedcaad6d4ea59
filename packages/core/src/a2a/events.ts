/**
 * Task stream events
 *
 * Produced by the dispatcher for tasks/sendSubscribe. The union is transport
 * agnostic; SSE framing happens at the HTTP boundary.
 */

import type { Message } from './types.js';
import { TaskStatus } from './types.js';

export type TaskStatusEvent = {
    type: 'status';
    taskId: string;
    status: TaskStatus.WORKING;
    message: string;
};

export type TaskChunkEvent = {
    type: 'chunk';
    taskId: string;
    chunk: string;
};

export type TaskResultEvent = {
    type: 'result';
    taskId: string;
    status: TaskStatus.COMPLETED;
    result: Message;
};

export type TaskErrorEvent = {
    type: 'error';
    taskId: string;
    status: TaskStatus.FAILED;
    error: string;
};

export type TaskStreamEvent = TaskStatusEvent | TaskChunkEvent | TaskResultEvent | TaskErrorEvent;

export type TerminalTaskStreamEvent = TaskResultEvent | TaskErrorEvent;

/**
 * SSE event names on the wire.
 */
export const TASK_EVENT_NAMES = {
    status: 'task-status',
    chunk: 'task-chunk',
    result: 'task-result',
    error: 'task-error',
} as const satisfies Record<TaskStreamEvent['type'], string>;

export type TaskEventName = (typeof TASK_EVENT_NAMES)[keyof typeof TASK_EVENT_NAMES];

export function isTerminalEvent(event: TaskStreamEvent): event is TerminalTaskStreamEvent {
    return event.type === 'result' || event.type === 'error';
}

/**
 * Wire payload for an event (the discriminator travels as the SSE event name).
 */
export function toEventPayload(event: TaskStreamEvent): Record<string, unknown> {
    const { type: _type, ...payload } = event;
    return payload;
}

export function statusEvent(taskId: string, message: string): TaskStatusEvent {
    return { type: 'status', taskId, status: TaskStatus.WORKING, message };
}

export function chunkEvent(taskId: string, chunk: string): TaskChunkEvent {
    return { type: 'chunk', taskId, chunk };
}

export function resultEvent(taskId: string, result: Message): TaskResultEvent {
    return { type: 'result', taskId, status: TaskStatus.COMPLETED, result };
}

export function errorEvent(taskId: string, error: string): TaskErrorEvent {
    return { type: 'error', taskId, status: TaskStatus.FAILED, error };
}
