/**
 * JSON-RPC 2.0 envelope types and builders
 *
 * @see https://www.jsonrpc.org/specification
 */

import type { A2AMethod } from './types.js';

export const JSONRPC_VERSION = '2.0';

/** Request ID. `null` only when the request id could not be determined. */
export type JsonRpcId = string | number | null;

/**
 * A2A error code taxonomy. Standard JSON-RPC codes plus the -32000 range
 * for task-level failures.
 */
export enum A2AErrorCode {
    /** Invalid JSON was received by the server */
    PARSE_ERROR = -32700,
    /** The JSON sent is not a valid Request object */
    INVALID_REQUEST = -32600,
    /** The method does not exist / is not available */
    METHOD_NOT_FOUND = -32601,
    /** Invalid method parameter(s) */
    INVALID_PARAMS = -32602,
    /** Internal error, including agent capability failures */
    INTERNAL_ERROR = -32603,
    TASK_NOT_FOUND = -32000,
    AGENT_UNAVAILABLE = -32001,
    TASK_CANCELED = -32002,
}

export interface JsonRpcRequest<P = Record<string, unknown>> {
    jsonrpc: typeof JSONRPC_VERSION;
    id: string | number;
    method: A2AMethod;
    params: P;
}

export interface JsonRpcError {
    code: number;
    message: string;
    data?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse<R = Record<string, unknown>> {
    jsonrpc: typeof JSONRPC_VERSION;
    id: JsonRpcId;
    result: R;
}

export interface JsonRpcErrorResponse {
    jsonrpc: typeof JSONRPC_VERSION;
    id: JsonRpcId;
    error: JsonRpcError;
}

/**
 * Exactly one of `result` or `error` is present.
 */
export type JsonRpcResponse<R = Record<string, unknown>> =
    | JsonRpcSuccessResponse<R>
    | JsonRpcErrorResponse;

export function createRequest<P>(
    id: string | number,
    method: A2AMethod,
    params: P
): JsonRpcRequest<P> {
    return { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createSuccessResponse<R>(id: JsonRpcId, result: R): JsonRpcSuccessResponse<R> {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function createErrorResponse(
    id: JsonRpcId,
    code: A2AErrorCode,
    message: string,
    data?: Record<string, unknown>
): JsonRpcErrorResponse {
    return {
        jsonrpc: JSONRPC_VERSION,
        id,
        error: {
            code,
            message,
            ...(data !== undefined && { data }),
        },
    };
}

/**
 * Type guard to check if response is an error
 */
export function isJsonRpcError<R>(response: JsonRpcResponse<R>): response is JsonRpcErrorResponse {
    return 'error' in response;
}
