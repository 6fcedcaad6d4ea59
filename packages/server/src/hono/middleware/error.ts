import type { Context } from 'hono';
import type { Logger } from '@pacer/core';
import { ErrorType, isPacerRuntimeError, toErrorMessage } from '@pacer/core';

export const mapErrorTypeToStatus = (type: ErrorType) => {
    switch (type) {
        case ErrorType.USER:
            return 400;
        case ErrorType.NOT_FOUND:
            return 404;
        case ErrorType.TIMEOUT:
            return 408;
        case ErrorType.CONFLICT:
            return 409;
        case ErrorType.RATE_LIMIT:
            return 429;
        case ErrorType.THIRD_PARTY:
            return 502;
        case ErrorType.SYSTEM:
        case ErrorType.UNKNOWN:
        default:
            return 500;
    }
};

/**
 * Error handler for non-JSON-RPC routes. The JSON-RPC route answers every
 * failure with an envelope itself.
 */
export function createErrorHandler(logger: Logger) {
    return (err: Error, ctx: Context) => {
        if (isPacerRuntimeError(err)) {
            return ctx.json(err.toJSON(), mapErrorTypeToStatus(err.type));
        }

        logger.error(`Unhandled error in HTTP layer: ${toErrorMessage(err)}`, {
            stack: err.stack,
        });

        return ctx.json(
            {
                code: 'internal_error',
                message: 'An unexpected error occurred. Please try again later.',
                scope: 'system',
                type: ErrorType.SYSTEM,
            },
            500
        );
    };
}
