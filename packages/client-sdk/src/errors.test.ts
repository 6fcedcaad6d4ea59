import { describe, it, expect } from 'vitest';
import { A2AErrorCode } from '@pacer/core';
import { A2AClientError, ClientError, classifyHttpStatus } from './errors.js';

describe('ClientError Factory', () => {
    describe('HTTP errors', () => {
        it.each([
            [503, 'service_unavailable'],
            [502, 'service_unavailable'],
            [429, 'throttling'],
            [408, 'timeout'],
            [504, 'timeout'],
            [500, 'http_error'],
            [404, 'http_error'],
        ] as const)('classifies status %i as %s', (status, kind) => {
            expect(classifyHttpStatus(status)).toBe(kind);
        });

        it('prefixes the message with the peer name', () => {
            const error = ClientError.httpError('biomechanics', 503, 'Service Unavailable', 'down');

            expect(error).toBeInstanceOf(A2AClientError);
            expect(error.message).toBe('[biomechanics] HTTP 503: Service Unavailable');
            expect(error.detail).toBe('HTTP 503: Service Unavailable');
            expect(error.status).toBe(503);
            expect(error.data).toEqual({ body: 'down' });
            expect(error.retryable).toBe(true);
            expect(error.attempts).toBe(1);
        });

        it('does not retry client errors', () => {
            expect(ClientError.httpError('lifesync', 400, 'Bad Request').retryable).toBe(false);
        });
    });

    describe('JSON-RPC errors', () => {
        it('treats AGENT_UNAVAILABLE as retryable', () => {
            const error = ClientError.rpcError('lifesync', A2AErrorCode.AGENT_UNAVAILABLE, 'busy');

            expect(error.kind).toBe('service_unavailable');
            expect(error.rpcCode).toBe(-32001);
            expect(error.retryable).toBe(true);
        });

        it('keeps other codes as non-retryable rpc errors', () => {
            const error = ClientError.rpcError('lifesync', A2AErrorCode.INTERNAL_ERROR, 'boom', {
                taskId: 'validate-1',
            });

            expect(error.kind).toBe('rpc_error');
            expect(error.data).toEqual({ taskId: 'validate-1' });
            expect(error.retryable).toBe(false);
        });
    });

    it('marks connection failures as non-retryable', () => {
        const cause = new Error('ECONNREFUSED');
        const error = ClientError.connectionFailed('biomechanics', 'http://localhost:8082', cause);

        expect(error.kind).toBe('connection');
        expect(error.cause).toBe(cause);
        expect(error.retryable).toBe(false);
    });

    it('stamps the attempt count when retries run out', () => {
        const last = ClientError.timeout('biomechanics', 5000);
        const error = ClientError.retriesExhausted(last, 3);

        expect(error.message).toBe(
            '[biomechanics] Agent unavailable after 3 attempts: Request timed out after 5000ms'
        );
        expect(error.kind).toBe('timeout');
        expect(error.attempts).toBe(3);
        expect(error.cause).toBe(last);
    });
});
