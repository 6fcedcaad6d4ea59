/**
 * A2A Server Dispatcher
 *
 * Routes JSON-RPC requests over the four A2A methods, owns task lifecycle
 * transitions and produces either a buffered response or a stream of task
 * events. Capability failures never escape: they become INTERNAL_ERROR
 * responses or a terminal task-error event.
 */

import type {
    JsonRpcId,
    JsonRpcResponse,
    Logger,
    Message,
    TaskStreamEvent,
    TaskView,
} from '@pacer/core';
import {
    A2AErrorCode,
    A2AMethod,
    A2AMethodSchema,
    JsonRpcRequestEnvelopeSchema,
    PacerLogComponent,
    TaskIdParamsSchema,
    TaskSendParamsSchema,
    TaskStatus,
    chunkEvent,
    createErrorResponse,
    createSuccessResponse,
    errorEvent,
    resultEvent,
    statusEvent,
    toErrorMessage,
} from '@pacer/core';
import type { ZodError } from 'zod';
import type { AgentCapability, CapabilityContext } from './capability.js';
import { TaskStore, toTaskView } from '../tasks/task-store.js';

export type A2AResponse = JsonRpcResponse<TaskView>;

export type DispatchOutcome =
    | { kind: 'response'; response: A2AResponse }
    | { kind: 'stream'; taskId: string; events: AsyncGenerator<TaskStreamEvent, void, undefined> };

export interface A2ADispatcherOptions {
    store: TaskStore;
    capability: AgentCapability;
    logger: Logger;
}

export class A2ADispatcher {
    private readonly store: TaskStore;
    private readonly capability: AgentCapability;
    private readonly logger: Logger;

    constructor(options: A2ADispatcherOptions) {
        this.store = options.store;
        this.capability = options.capability;
        this.logger = options.logger.createChild(PacerLogComponent.A2A);
    }

    /**
     * Dispatch a decoded JSON-RPC request body.
     */
    async dispatch(body: unknown): Promise<DispatchOutcome> {
        const envelope = JsonRpcRequestEnvelopeSchema.safeParse(body);
        if (!envelope.success) {
            return respond(
                createErrorResponse(
                    requestIdOf(body),
                    A2AErrorCode.INVALID_REQUEST,
                    'Invalid Request',
                    { issues: formatIssues(envelope.error) }
                )
            );
        }

        const { id, method, params } = envelope.data;
        const knownMethod = A2AMethodSchema.safeParse(method);
        if (!knownMethod.success) {
            this.logger.warn(`Unknown A2A method: ${method}`, { requestId: id });
            return respond(
                createErrorResponse(id, A2AErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`)
            );
        }

        this.logger.debug(`A2A request received`, { method, requestId: id });

        switch (knownMethod.data) {
            case A2AMethod.SEND:
                return respond(await this.handleSend(id, params));
            case A2AMethod.GET:
                return respond(this.handleGet(id, params));
            case A2AMethod.CANCEL:
                return respond(this.handleCancel(id, params));
            case A2AMethod.SEND_SUBSCRIBE:
                return this.handleSendSubscribe(id, params);
        }
    }

    private async handleSend(id: JsonRpcId, params: unknown): Promise<A2AResponse> {
        const parsed = TaskSendParamsSchema.safeParse(params);
        if (!parsed.success) {
            return invalidParams(id, parsed.error);
        }
        const { task } = parsed.data;

        const rejection = this.admit(id, task.id, task.message);
        if (rejection) {
            return rejection;
        }

        try {
            const result = await this.capability.execute(task.message, this.contextFor(task.id));
            const completed = this.store.complete(task.id, result);
            this.logger.info(`Task ${task.id} completed`);
            return createSuccessResponse(id, {
                taskId: task.id,
                status: completed?.status ?? TaskStatus.COMPLETED,
                result,
            });
        } catch (error) {
            const message = toErrorMessage(error);
            this.store.fail(task.id);
            this.logger.error(`Task ${task.id} failed: ${message}`, { taskId: task.id });
            return createErrorResponse(id, A2AErrorCode.INTERNAL_ERROR, message, {
                taskId: task.id,
                error: message,
            });
        }
    }

    private handleGet(id: JsonRpcId, params: unknown): A2AResponse {
        const parsed = TaskIdParamsSchema.safeParse(params);
        if (!parsed.success) {
            return invalidParams(id, parsed.error);
        }
        const task = this.store.get(parsed.data.taskId);
        if (!task) {
            return taskNotFound(id, parsed.data.taskId);
        }
        return createSuccessResponse(id, toTaskView(task));
    }

    private handleCancel(id: JsonRpcId, params: unknown): A2AResponse {
        const parsed = TaskIdParamsSchema.safeParse(params);
        if (!parsed.success) {
            return invalidParams(id, parsed.error);
        }
        const { taskId } = parsed.data;
        const task = this.store.cancel(taskId);
        if (!task) {
            return taskNotFound(id, taskId);
        }
        this.logger.info(`Task ${taskId} cancel requested, status is now ${task.status}`);
        return createSuccessResponse(id, { taskId, status: task.status });
    }

    private handleSendSubscribe(id: JsonRpcId, params: unknown): DispatchOutcome {
        const parsed = TaskSendParamsSchema.safeParse(params);
        if (!parsed.success) {
            return respond(invalidParams(id, parsed.error));
        }
        const { task } = parsed.data;

        const rejection = this.admit(id, task.id, task.message);
        if (rejection) {
            return respond(rejection);
        }

        return { kind: 'stream', taskId: task.id, events: this.runStream(task.id, task.message) };
    }

    /**
     * Yields zero or more status/chunk events and then exactly one terminal
     * event, which is always the last.
     */
    private async *runStream(
        taskId: string,
        message: Message
    ): AsyncGenerator<TaskStreamEvent, void, undefined> {
        let settled = false;
        try {
            let result: Message;
            if (this.capability.stream) {
                const updates = this.capability.stream(message, this.contextFor(taskId));
                let next = await updates.next();
                while (!next.done) {
                    const update = next.value;
                    yield update.type === 'progress'
                        ? statusEvent(taskId, update.message)
                        : chunkEvent(taskId, update.text);
                    next = await updates.next();
                }
                result = next.value;
            } else {
                yield statusEvent(taskId, 'Processing task');
                result = await this.capability.execute(message, this.contextFor(taskId));
            }

            this.store.complete(taskId, result);
            settled = true;
            this.logger.info(`Streaming task ${taskId} completed`);
            yield resultEvent(taskId, result);
        } catch (error) {
            const reason = toErrorMessage(error);
            this.store.fail(taskId);
            settled = true;
            this.logger.error(`Streaming task ${taskId} failed: ${reason}`, { taskId });
            yield errorEvent(taskId, reason);
        } finally {
            if (!settled) {
                // Subscriber went away before the capability finished
                this.store.fail(taskId);
                this.logger.warn(`Stream for task ${taskId} closed before completion`);
            }
        }
    }

    /**
     * Register a new task and move it to working, or explain why it cannot run.
     */
    private admit(id: JsonRpcId, taskId: string, message: Message): A2AResponse | undefined {
        const existing = this.store.get(taskId);
        if (existing) {
            if (existing.status === TaskStatus.CANCELED) {
                return createErrorResponse(id, A2AErrorCode.TASK_CANCELED, `Task canceled: ${taskId}`, {
                    taskId,
                });
            }
            return createErrorResponse(
                id,
                A2AErrorCode.INVALID_PARAMS,
                `Task already exists: ${taskId}`,
                { taskId, status: existing.status }
            );
        }

        this.store.create(taskId, message);
        this.store.markWorking(taskId);
        this.logger.info(`Task ${taskId} accepted`);
        return undefined;
    }

    private contextFor(taskId: string): CapabilityContext {
        return { taskId, logger: this.logger };
    }
}

function respond(response: A2AResponse): DispatchOutcome {
    return { kind: 'response', response };
}

function invalidParams(id: JsonRpcId, error: ZodError): A2AResponse {
    return createErrorResponse(id, A2AErrorCode.INVALID_PARAMS, 'Invalid params', {
        issues: formatIssues(error),
    });
}

function taskNotFound(id: JsonRpcId, taskId: string): A2AResponse {
    return createErrorResponse(id, A2AErrorCode.TASK_NOT_FOUND, `Task not found: ${taskId}`, {
        taskId,
    });
}

function formatIssues(error: ZodError): string[] {
    return error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
}

/**
 * Best-effort id recovery from a body that failed envelope validation.
 */
function requestIdOf(body: unknown): JsonRpcId {
    if (typeof body === 'object' && body !== null && 'id' in body) {
        const { id } = body;
        if (typeof id === 'string' || typeof id === 'number') {
            return id;
        }
    }
    return null;
}
