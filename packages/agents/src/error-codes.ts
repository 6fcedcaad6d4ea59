/**
 * Agent error codes
 */
export enum AgentErrorCode {
    DATA_FILE_INVALID = 'agent_data_file_invalid',
    GENERATION_FAILED = 'agent_generation_failed',
}
