import type { ErrorScope, ErrorType } from './types.js';

/**
 * Serialized form of a runtime error, safe to put on the wire or in a log entry.
 */
export interface SerializedRuntimeError {
    code: string;
    message: string;
    scope: ErrorScope;
    type: ErrorType;
    context?: Record<string, unknown>;
    recovery?: string;
}

/**
 * Runtime error raised by a functional domain.
 *
 * Carries a domain-specific code, the scope that raised it and an ErrorType that
 * transports map to their own status codes. Create instances through the per-domain
 * factories (ConfigError, LoggerError, OrchestrationError) rather than directly.
 */
export class PacerRuntimeError<C extends Record<string, unknown> = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: string,
        public readonly scope: ErrorScope,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string
    ) {
        super(message);
        this.name = 'PacerRuntimeError';
    }

    toJSON(): SerializedRuntimeError {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(this.context !== undefined && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}

export function isPacerRuntimeError(error: unknown): error is PacerRuntimeError {
    return error instanceof PacerRuntimeError;
}
