/**
 * Typed failures for outbound A2A calls.
 *
 * Every transport maps what went wrong onto one TransportFailureKind; the
 * retry policy only looks at the kind.
 */

import { A2AErrorCode } from '@pacer/core';

export type TransportFailureKind =
    | 'service_unavailable'
    | 'throttling'
    | 'timeout'
    | 'connection'
    | 'http_error'
    | 'rpc_error'
    | 'invalid_response'
    | 'unsupported'
    | 'invalid_config';

/** Failure kinds worth another attempt */
export const RETRYABLE_FAILURE_KINDS: ReadonlySet<TransportFailureKind> = new Set([
    'service_unavailable',
    'throttling',
    'timeout',
]);

export interface A2AClientErrorDetails {
    kind: TransportFailureKind;
    peer: string;
    status?: number;
    rpcCode?: number;
    data?: Record<string, unknown>;
    attempts?: number;
    cause?: unknown;
}

export class A2AClientError extends Error {
    readonly kind: TransportFailureKind;
    readonly peer: string;
    readonly status: number | undefined;
    readonly rpcCode: number | undefined;
    readonly data: Record<string, unknown> | undefined;
    readonly attempts: number;
    /** Message without the peer prefix */
    readonly detail: string;

    constructor(message: string, details: A2AClientErrorDetails) {
        super(`[${details.peer}] ${message}`, { cause: details.cause });
        this.name = 'A2AClientError';
        this.detail = message;
        this.kind = details.kind;
        this.peer = details.peer;
        this.status = details.status;
        this.rpcCode = details.rpcCode;
        this.data = details.data;
        this.attempts = details.attempts ?? 1;
    }

    get retryable(): boolean {
        return RETRYABLE_FAILURE_KINDS.has(this.kind);
    }

    /**
     * Copy of this error stamped with the number of attempts made.
     */
    withAttempts(attempts: number, message?: string): A2AClientError {
        return new A2AClientError(message ?? this.detail, {
            kind: this.kind,
            peer: this.peer,
            ...(this.status !== undefined && { status: this.status }),
            ...(this.rpcCode !== undefined && { rpcCode: this.rpcCode }),
            ...(this.data !== undefined && { data: this.data }),
            attempts,
            cause: this.cause ?? this,
        });
    }
}

export function isA2AClientError(error: unknown): error is A2AClientError {
    return error instanceof A2AClientError;
}

export function classifyHttpStatus(status: number): TransportFailureKind {
    switch (status) {
        case 502:
        case 503:
            return 'service_unavailable';
        case 429:
            return 'throttling';
        case 408:
        case 504:
            return 'timeout';
        default:
            return 'http_error';
    }
}

/**
 * Simple error factory for the client SDK
 */
export class ClientError {
    static httpError(peer: string, status: number, statusText: string, body?: unknown) {
        return new A2AClientError(`HTTP ${status}: ${statusText}`, {
            kind: classifyHttpStatus(status),
            peer,
            status,
            ...(body !== undefined && { data: { body } }),
        });
    }

    static connectionFailed(peer: string, destination: string, cause: unknown) {
        return new A2AClientError(`Failed to connect to ${destination}`, {
            kind: 'connection',
            peer,
            cause,
        });
    }

    static timeout(peer: string, timeoutMs: number, cause?: unknown) {
        return new A2AClientError(`Request timed out after ${timeoutMs}ms`, {
            kind: 'timeout',
            peer,
            cause,
        });
    }

    static rpcError(peer: string, code: number, message: string, data?: Record<string, unknown>) {
        return new A2AClientError(message, {
            kind: code === A2AErrorCode.AGENT_UNAVAILABLE ? 'service_unavailable' : 'rpc_error',
            peer,
            rpcCode: code,
            ...(data !== undefined && { data }),
        });
    }

    static invalidResponse(peer: string, reason: string, cause?: unknown) {
        return new A2AClientError(`Invalid response: ${reason}`, {
            kind: 'invalid_response',
            peer,
            cause,
        });
    }

    static unsupported(peer: string, operation: string, transport: string) {
        return new A2AClientError(`${operation} is not supported over the ${transport} transport`, {
            kind: 'unsupported',
            peer,
        });
    }

    static invalidConfig(peer: string, field: string, reason: string) {
        return new A2AClientError(`Invalid configuration for ${field}: ${reason}`, {
            kind: 'invalid_config',
            peer,
        });
    }

    static retriesExhausted(last: A2AClientError, attempts: number) {
        return last.withAttempts(
            attempts,
            `Agent unavailable after ${attempts} attempts: ${last.detail}`
        );
    }
}
