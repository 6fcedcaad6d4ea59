import type { AgentCard, JsonRpcRequest, JsonRpcResponse } from '@pacer/core';
import type { TransportKind } from '../detect.js';

// Derive fetch types to avoid relying on DOM lib globals
export type FetchInput = Parameters<typeof fetch>[0];
export type FetchInit = NonNullable<Parameters<typeof fetch>[1]>;
export type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export interface FetchFunction {
    (input: FetchInput, init?: FetchInit): Promise<FetchResponse>;
}

/**
 * One way of delivering a JSON-RPC request to a peer agent.
 *
 * Transports map every failure onto an A2AClientError; they never retry.
 */
export interface A2ATransport {
    readonly kind: TransportKind;

    /**
     * Deliver a request and return the validated JSON-RPC response envelope.
     * A JSON-RPC error envelope is returned, not thrown.
     */
    call(request: JsonRpcRequest<unknown>): Promise<JsonRpcResponse>;

    /**
     * Deliver a tasks/sendSubscribe request and return the raw streaming response.
     * Only transports that can hold a response open implement this.
     */
    openStream?(request: JsonRpcRequest<unknown>, signal?: AbortSignal): Promise<FetchResponse>;

    getAgentCard?(): Promise<AgentCard>;
}
