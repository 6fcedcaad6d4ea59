/**
 * Error scopes representing functional domains in the system.
 * Each scope owns its error codes and factory.
 */
export enum ErrorScope {
    A2A = 'a2a', // JSON-RPC dispatch, task lifecycle, wire validation
    CLIENT = 'client', // Outbound A2A calls and transports
    ORCHESTRATION = 'orchestration', // Planner/validator sequencing
    CONFIG = 'config', // Environment loading and validation
    LOGGER = 'logger', // Logger configuration and transports
    AGENT = 'agent', // Agent capabilities and their LLM calls
}

/**
 * Error types that map directly to HTTP status codes.
 * Each type represents the nature of the error.
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (task, agent card, ...)
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, concurrent operation
    RATE_LIMIT = 'rate_limit', // 429 - too many requests
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - downstream agent or provider failures
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}
