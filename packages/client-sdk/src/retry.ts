import type { Logger } from '@pacer/core';
import { A2AClientError, ClientError } from './errors.js';

export interface RetryPolicy {
    /** Total attempts including the first */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 10_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the attempt following `attempt` (0-based): base * 2^attempt, capped.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
    return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

export interface RetryOptions {
    policy: RetryPolicy;
    sleep: Sleep;
    logger: Logger;
    /** Label for log lines */
    operation: string;
}

/**
 * Run `operation`, retrying retryable A2AClientErrors with exponential backoff.
 * Non-retryable failures surface on the attempt that produced them.
 */
export async function withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const { policy, sleep, logger } = options;

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (!(error instanceof A2AClientError)) {
                throw error;
            }

            const attemptsMade = attempt + 1;
            if (!error.retryable) {
                throw attemptsMade > 1 ? error.withAttempts(attemptsMade) : error;
            }
            if (attemptsMade >= policy.maxAttempts) {
                throw ClientError.retriesExhausted(error, attemptsMade);
            }

            const delay = computeBackoffDelay(attempt, policy);
            logger.warn(
                `${options.operation} failed (${error.kind}), retrying in ${delay}ms`,
                { peer: error.peer, attempt: attemptsMade, maxAttempts: policy.maxAttempts }
            );
            await sleep(delay);
        }
    }
}
