import { ErrorScope, ErrorType, PacerRuntimeError } from '@pacer/core';
import { AgentErrorCode } from './error-codes.js';

/**
 * Agent error factory with typed methods for creating agent errors
 */
export class AgentError {
    static dataFileInvalid(file: string, issues: string[]) {
        return new PacerRuntimeError(
            AgentErrorCode.DATA_FILE_INVALID,
            ErrorScope.AGENT,
            ErrorType.SYSTEM,
            `Data file '${file}' is invalid: ${issues.join('; ')}`,
            { file, issues }
        );
    }

    static generationFailed(modelId: string, reason: string) {
        return new PacerRuntimeError(
            AgentErrorCode.GENERATION_FAILED,
            ErrorScope.AGENT,
            ErrorType.THIRD_PARTY,
            `Model '${modelId}' failed: ${reason}`,
            { modelId, reason },
            'Check AWS credentials, AWS_REGION and MODEL_ID'
        );
    }
}
