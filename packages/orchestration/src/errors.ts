import {
    ErrorScope,
    ErrorType,
    PacerRuntimeError,
    isPacerRuntimeError,
    toErrorMessage,
} from '@pacer/core';
import { isA2AClientError } from '@pacer/client-sdk';
import { OrchestrationErrorCode } from './error-codes.js';
import type { OrchestrationRole } from './types.js';

export interface OrchestrationErrorContext extends Record<string, unknown> {
    role: OrchestrationRole;
    lastError: string;
    /** JSON-RPC or HTTP code of the last failure, when there was one */
    code?: number;
}

/**
 * Orchestration error factory
 */
export class OrchestrationError {
    /**
     * A downstream role failed after the client's retry budget was spent.
     */
    static roleFailed(role: OrchestrationRole, cause: unknown) {
        const lastError = toErrorMessage(cause);
        const code = isA2AClientError(cause) ? (cause.rpcCode ?? cause.status) : undefined;
        const context: OrchestrationErrorContext = {
            role,
            lastError,
            ...(code !== undefined && { code }),
        };
        return new PacerRuntimeError(
            OrchestrationErrorCode.ROLE_FAILED,
            ErrorScope.ORCHESTRATION,
            ErrorType.THIRD_PARTY,
            `The ${role} agent failed: ${lastError}`,
            context,
            `Check that the ${role} agent is running and reachable`
        );
    }

    /**
     * A role answered, but without the data part the orchestrator needs.
     */
    static invalidRoleReply(role: OrchestrationRole, reason: string) {
        const context: OrchestrationErrorContext = { role, lastError: reason };
        return new PacerRuntimeError(
            OrchestrationErrorCode.INVALID_ROLE_REPLY,
            ErrorScope.ORCHESTRATION,
            ErrorType.THIRD_PARTY,
            `The ${role} agent returned an unusable reply: ${reason}`,
            context
        );
    }
}

/**
 * Type guard for errors raised by the orchestration layer itself.
 */
export function isOrchestrationError(
    error: unknown
): error is PacerRuntimeError<OrchestrationErrorContext> {
    return isPacerRuntimeError(error) && error.scope === ErrorScope.ORCHESTRATION;
}
