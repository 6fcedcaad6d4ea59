import { PacerRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config error factory with typed methods for creating configuration errors
 */
export class ConfigError {
    static invalidEnvironment(issues: string[]) {
        return new PacerRuntimeError(
            ConfigErrorCode.INVALID_ENVIRONMENT,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid environment configuration: ${issues.join('; ')}`,
            { issues },
            'Check the variables in your shell or .env file'
        );
    }

    static envFileReadFailed(path: string, reason: string) {
        return new PacerRuntimeError(
            ConfigErrorCode.ENV_FILE_READ_FAILED,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read env file '${path}': ${reason}`,
            { path, reason }
        );
    }
}
