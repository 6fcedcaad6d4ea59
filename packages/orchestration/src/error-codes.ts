/**
 * Orchestration error codes
 */
export enum OrchestrationErrorCode {
    ROLE_FAILED = 'orchestration_role_failed',
    INVALID_ROLE_REPLY = 'orchestration_invalid_role_reply',
}
