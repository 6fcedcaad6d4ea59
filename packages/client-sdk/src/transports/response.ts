import { JSONRPC_VERSION, JsonRpcResponseSchema } from '@pacer/core';
import type { JsonRpcResponse } from '@pacer/core';
import { ClientError } from '../errors.js';

/**
 * Validate an untrusted JSON value as a JSON-RPC response envelope.
 */
export function parseJsonRpcResponse(peer: string, raw: unknown): JsonRpcResponse {
    const result = JsonRpcResponseSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw ClientError.invalidResponse(peer, `not a JSON-RPC response (${issues})`, result.error);
    }

    const envelope = result.data;
    if ('error' in envelope) {
        const { code, message, data } = envelope.error;
        return {
            jsonrpc: JSONRPC_VERSION,
            id: envelope.id,
            error: { code, message, ...(data !== undefined && { data }) },
        };
    }
    return { jsonrpc: JSONRPC_VERSION, id: envelope.id, result: envelope.result };
}

/**
 * Parse a response body that should hold JSON.
 */
export function parseJsonBody(peer: string, text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw ClientError.invalidResponse(peer, 'body is not valid JSON', error);
    }
}
