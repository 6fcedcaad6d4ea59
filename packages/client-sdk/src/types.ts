import type { Logger } from '@pacer/core';
import type { RetryPolicy, Sleep } from './retry.js';
import type { AgentCoreInvoker } from './transports/agentcore-transport.js';
import type { FetchFunction } from './transports/types.js';

export interface A2AClientOptions {
    /** Endpoint URL or managed-runtime ARN; decides the transport */
    destination: string;
    /** Logical peer name used in logs and failures */
    peer: string;
    logger: Logger;
    /** Per-attempt timeout (default 60000) */
    timeoutMs?: number | undefined;
    retry?: Partial<RetryPolicy> | undefined;
    /** Backoff sleep, replaceable in tests */
    sleep?: Sleep | undefined;
    /** HTTP transport only */
    fetch?: FetchFunction | undefined;
    /** Managed transport only; defaults to the AWS SDK invoker */
    agentCoreInvoker?: AgentCoreInvoker | undefined;
    /** Managed transport region; defaults to the ARN's region */
    region?: string | undefined;
}

export interface SendOptions {
    /** Prefix of the generated task id (default `task-`) */
    taskIdPrefix?: string | undefined;
}

export interface SubscribeOptions {
    signal?: AbortSignal | undefined;
}
