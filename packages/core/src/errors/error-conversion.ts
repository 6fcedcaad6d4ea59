/**
 * Extract a human-readable message from any thrown value, avoiding "[object Object]".
 */
export function toErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (error && typeof error === 'object' && 'message' in error) {
        const { message } = error;
        if (typeof message === 'string') {
            return message;
        }
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}

/**
 * Converts any thrown value to an Error instance, keeping the original as `cause`.
 */
export function toError(error: unknown): Error {
    if (error instanceof Error) {
        return error;
    }
    return new Error(toErrorMessage(error), { cause: error });
}
