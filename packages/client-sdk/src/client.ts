import { randomUUID } from 'node:crypto';
import {
    A2AMethod,
    PacerLogComponent,
    TaskStatus,
    TaskViewSchema,
    createRequest,
    isJsonRpcError,
} from '@pacer/core';
import type {
    AgentCard,
    Logger,
    Message,
    TaskSendParams,
    TaskIdParams,
    TaskStreamEvent,
    TaskView,
} from '@pacer/core';
import { classifyDestination } from './detect.js';
import type { TransportKind } from './detect.js';
import { ClientError } from './errors.js';
import { DEFAULT_RETRY_POLICY, defaultSleep, withRetry } from './retry.js';
import type { RetryOptions, RetryPolicy, Sleep } from './retry.js';
import { readTaskEvents } from './streaming.js';
import {
    AgentCoreTransport,
    BedrockAgentCoreInvoker,
    regionFromArn,
} from './transports/agentcore-transport.js';
import { HttpTransport } from './transports/http-transport.js';
import { parseJsonBody, parseJsonRpcResponse } from './transports/response.js';
import type { A2ATransport, FetchResponse } from './transports/types.js';
import type { A2AClientOptions, SendOptions, SubscribeOptions } from './types.js';

export const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_REGION = 'us-east-1';

/**
 * Task id with a readable prefix and 8 hex characters.
 */
export function generateTaskId(prefix = 'task-'): string {
    return `${prefix}${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

function createTransport(
    kind: TransportKind,
    options: A2AClientOptions,
    timeoutMs: number,
    logger: Logger
): A2ATransport {
    switch (kind) {
        case 'agentcore': {
            const region = options.region ?? regionFromArn(options.destination) ?? DEFAULT_REGION;
            return new AgentCoreTransport({
                agentRuntimeArn: options.destination,
                peer: options.peer,
                timeoutMs,
                invoker: options.agentCoreInvoker ?? BedrockAgentCoreInvoker.fromRegion(region),
                logger,
            });
        }
        case 'http':
            return new HttpTransport({
                url: options.destination,
                peer: options.peer,
                timeoutMs,
                logger,
                fetch: options.fetch,
            });
    }
}

/**
 * A2A client for one peer agent.
 *
 * The transport is chosen once, from the shape of the destination; every
 * operation then runs through the same request, retry and validation path.
 *
 * @example
 * ```typescript
 * const planner = new A2AClient({
 *     destination: 'http://localhost:8082',
 *     peer: 'biomechanics',
 *     logger,
 * });
 * const result = await planner.send(createMessage('user', [createTextPart('leg day')]));
 * ```
 */
export class A2AClient {
    readonly peer: string;
    readonly transportKind: TransportKind;

    private readonly transport: A2ATransport;
    private readonly logger: Logger;
    private readonly policy: RetryPolicy;
    private readonly sleep: Sleep;

    constructor(options: A2AClientOptions) {
        this.peer = options.peer;
        this.logger = options.logger.createChild(PacerLogComponent.CLIENT);

        const kind = classifyDestination(options.destination);
        if (kind === undefined) {
            throw ClientError.invalidConfig(options.peer, 'destination', 'must be a non-empty string');
        }
        this.transportKind = kind;
        this.transport = createTransport(
            kind,
            options,
            options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            this.logger
        );
        this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.sleep = options.sleep ?? defaultSleep;

        this.logger.debug(`A2A client for ${this.peer} uses the ${kind} transport`);
    }

    /**
     * Submit a new task and return its result message. Every attempt carries
     * a freshly generated task id, so a retry never collides with a task the
     * peer already admitted.
     */
    async send(message: Message, options: SendOptions = {}): Promise<Message> {
        const view = this.parseTaskView(
            await this.rpc(A2AMethod.SEND, () => ({
                task: { id: generateTaskId(options.taskIdPrefix), message },
            }))
        );
        if (view.status !== TaskStatus.COMPLETED || !view.result) {
            throw ClientError.invalidResponse(
                this.peer,
                `task ${view.taskId} ended as ${view.status} without a result`
            );
        }
        return view.result;
    }

    /**
     * Submit a task under `taskId`. Retries run under a fresh id derived from
     * it; the returned view names the id that completed.
     */
    async sendTask(taskId: string, message: Message): Promise<TaskView> {
        return this.parseTaskView(
            await this.rpc(A2AMethod.SEND, (attempt) => ({
                task: { id: attemptTaskId(taskId, attempt), message },
            }))
        );
    }

    async getTask(taskId: string): Promise<TaskView> {
        const params: TaskIdParams = { taskId };
        return this.parseTaskView(await this.rpc(A2AMethod.GET, () => params));
    }

    async cancelTask(taskId: string): Promise<TaskView> {
        const params: TaskIdParams = { taskId };
        return this.parseTaskView(await this.rpc(A2AMethod.CANCEL, () => params));
    }

    async getAgentCard(): Promise<AgentCard> {
        const getAgentCard = this.transport.getAgentCard?.bind(this.transport);
        if (!getAgentCard) {
            throw ClientError.unsupported(this.peer, 'getAgentCard', this.transport.kind);
        }
        return withRetry(() => getAgentCard(), this.retryOptions('getAgentCard'));
    }

    /**
     * Submit a task through tasks/sendSubscribe and yield its events, ending
     * with the terminal one. A retried open uses a fresh id derived from `taskId`.
     */
    async *subscribe(
        taskId: string,
        message: Message,
        options: SubscribeOptions = {}
    ): AsyncGenerator<TaskStreamEvent> {
        const openStream = this.transport.openStream?.bind(this.transport);
        if (!openStream) {
            throw ClientError.unsupported(this.peer, 'subscribe', this.transport.kind);
        }

        const response = await withRetry((attempt) => {
            const params: TaskSendParams = {
                task: { id: attemptTaskId(taskId, attempt), message },
            };
            return openStream(
                createRequest(randomUUID(), A2AMethod.SEND_SUBSCRIBE, params),
                options.signal
            );
        }, this.retryOptions(A2AMethod.SEND_SUBSCRIBE));

        if (!isEventStream(response)) {
            // Rejected before streaming started: the body is a JSON-RPC envelope
            await this.throwEnvelopeError(response);
        }
        yield* readTaskEvents(this.peer, response, { signal: options.signal });
    }

    private async rpc(
        method: A2AMethod,
        paramsFor: (attempt: number) => TaskSendParams | TaskIdParams
    ): Promise<Record<string, unknown>> {
        return withRetry(async (attempt) => {
            const request = createRequest(randomUUID(), method, paramsFor(attempt));
            this.logger.debug(`${method} -> ${this.peer}`, { requestId: request.id, attempt });

            const response = await this.transport.call(request);
            if (isJsonRpcError(response)) {
                const { code, message, data } = response.error;
                throw ClientError.rpcError(this.peer, code, message, data);
            }
            return response.result;
        }, this.retryOptions(method));
    }

    private parseTaskView(result: Record<string, unknown>): TaskView {
        const parsed = TaskViewSchema.safeParse(result);
        if (!parsed.success) {
            throw ClientError.invalidResponse(this.peer, 'malformed task result', parsed.error);
        }
        return parsed.data;
    }

    private async throwEnvelopeError(response: FetchResponse): Promise<never> {
        const body = await response.text();
        const envelope = parseJsonRpcResponse(this.peer, parseJsonBody(this.peer, body));
        if (isJsonRpcError(envelope)) {
            const { code, message, data } = envelope.error;
            throw ClientError.rpcError(this.peer, code, message, data);
        }
        throw ClientError.invalidResponse(this.peer, 'expected an event stream');
    }

    private retryOptions(operation: string): RetryOptions {
        return { policy: this.policy, sleep: this.sleep, logger: this.logger, operation };
    }
}

function attemptTaskId(taskId: string, attempt: number): string {
    return attempt === 0 ? taskId : generateTaskId(`${taskId}-`);
}

function isEventStream(response: FetchResponse): boolean {
    return (response.headers.get('content-type') ?? '').includes('text/event-stream');
}
