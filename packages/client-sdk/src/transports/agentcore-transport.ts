import {
    BedrockAgentCoreClient,
    InvokeAgentRuntimeCommand,
} from '@aws-sdk/client-bedrock-agentcore';
import type { JsonRpcRequest, JsonRpcResponse, Logger } from '@pacer/core';
import { A2AClientError, classifyHttpStatus } from '../errors.js';
import type { TransportFailureKind } from '../errors.js';
import { parseJsonBody, parseJsonRpcResponse } from './response.js';
import type { A2ATransport } from './types.js';

export interface AgentCoreInvocation {
    agentRuntimeArn: string;
    /** Serialized JSON-RPC request */
    payload: string;
    abortSignal?: AbortSignal | undefined;
}

/**
 * Invoke-by-identifier capability of the managed runtime.
 * Resolves with the response body as text.
 */
export interface AgentCoreInvoker {
    invoke(invocation: AgentCoreInvocation): Promise<string>;
}

/**
 * AgentCoreInvoker backed by the AWS SDK. Credentials come from the default
 * provider chain.
 */
export class BedrockAgentCoreInvoker implements AgentCoreInvoker {
    constructor(private readonly client: BedrockAgentCoreClient) {}

    static fromRegion(region: string): BedrockAgentCoreInvoker {
        return new BedrockAgentCoreInvoker(new BedrockAgentCoreClient({ region }));
    }

    async invoke({ agentRuntimeArn, payload, abortSignal }: AgentCoreInvocation): Promise<string> {
        const command = new InvokeAgentRuntimeCommand({
            agentRuntimeArn,
            qualifier: 'DEFAULT',
            contentType: 'application/json',
            accept: 'application/json',
            payload: new TextEncoder().encode(payload),
        });
        const output = await this.client.send(command, { abortSignal });
        if (!output.response) {
            throw new Error('InvokeAgentRuntime returned no response body');
        }
        return output.response.transformToString();
    }
}

/**
 * Region segment of an ARN (`arn:partition:service:region:account:resource`).
 */
export function regionFromArn(arn: string): string | undefined {
    const region = arn.split(':')[3];
    return region ? region : undefined;
}

function errorName(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'name' in error) {
        return typeof error.name === 'string' ? error.name : undefined;
    }
    return undefined;
}

function httpStatusOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
        return undefined;
    }
    const metadata = error.$metadata;
    if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
        return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
    }
    return undefined;
}

/**
 * Map an AWS SDK failure onto a transport failure kind.
 */
export function classifyAgentCoreError(error: unknown): TransportFailureKind {
    switch (errorName(error)) {
        case 'ServiceUnavailableException':
            return 'service_unavailable';
        case 'ThrottlingException':
            return 'throttling';
        case 'TimeoutError':
        case 'AbortError':
        case 'RequestTimeout':
            return 'timeout';
    }
    const status = httpStatusOf(error);
    return status === undefined ? 'connection' : classifyHttpStatus(status);
}

export interface AgentCoreTransportOptions {
    agentRuntimeArn: string;
    peer: string;
    timeoutMs: number;
    invoker: AgentCoreInvoker;
    logger: Logger;
}

/**
 * Managed-invocation transport: the JSON-RPC request travels as the
 * InvokeAgentRuntime payload.
 */
export class AgentCoreTransport implements A2ATransport {
    readonly kind = 'agentcore' as const;

    constructor(private readonly options: AgentCoreTransportOptions) {}

    async call(request: JsonRpcRequest<unknown>): Promise<JsonRpcResponse> {
        const { agentRuntimeArn, peer, timeoutMs, invoker, logger } = this.options;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        logger.debug(`InvokeAgentRuntime ${agentRuntimeArn}`, { peer, method: request.method });
        let text: string;
        try {
            text = await invoker.invoke({
                agentRuntimeArn,
                payload: JSON.stringify(request),
                abortSignal: controller.signal,
            });
        } catch (error) {
            const kind = controller.signal.aborted ? 'timeout' : classifyAgentCoreError(error);
            const status = httpStatusOf(error);
            const reason = error instanceof Error ? error.message : String(error);
            throw new A2AClientError(`InvokeAgentRuntime failed: ${reason}`, {
                kind,
                peer,
                ...(status !== undefined && { status }),
                cause: error,
            });
        } finally {
            clearTimeout(timeoutId);
        }

        return parseJsonRpcResponse(peer, parseJsonBody(peer, text));
    }
}
