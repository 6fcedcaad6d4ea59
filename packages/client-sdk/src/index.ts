/**
 * @pacer/client-sdk
 * Transport-detecting A2A client for calling peer agents
 */

// Client
export { A2AClient, generateTaskId, DEFAULT_TIMEOUT_MS } from './client.js';
export type { A2AClientOptions, SendOptions, SubscribeOptions } from './types.js';

// Transport selection
export { classifyDestination, isResourceName } from './detect.js';
export type { TransportKind } from './detect.js';

// Transports
export { HttpTransport } from './transports/http-transport.js';
export type { HttpTransportOptions } from './transports/http-transport.js';
export {
    AgentCoreTransport,
    BedrockAgentCoreInvoker,
    classifyAgentCoreError,
    regionFromArn,
} from './transports/agentcore-transport.js';
export type {
    AgentCoreInvocation,
    AgentCoreInvoker,
    AgentCoreTransportOptions,
} from './transports/agentcore-transport.js';
export type {
    A2ATransport,
    FetchFunction,
    FetchInit,
    FetchInput,
    FetchResponse,
} from './transports/types.js';

// Retry
export { DEFAULT_RETRY_POLICY, computeBackoffDelay, withRetry } from './retry.js';
export type { RetryPolicy, RetryOptions, Sleep } from './retry.js';

// SSE streaming
export { stream, parseSSE, readTaskEvents, toTaskStreamEvent } from './streaming.js';
export type { SSEEvent } from './streaming.js';

// Errors
export {
    A2AClientError,
    ClientError,
    RETRYABLE_FAILURE_KINDS,
    classifyHttpStatus,
    isA2AClientError,
} from './errors.js';
export type { A2AClientErrorDetails, TransportFailureKind } from './errors.js';
