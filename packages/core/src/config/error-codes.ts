/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    INVALID_ENVIRONMENT = 'config_invalid_environment',
    ENV_FILE_READ_FAILED = 'config_env_file_read_failed',
}
