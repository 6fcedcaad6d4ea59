/**
 * Logger Types and Interfaces
 *
 * Defines the core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with additional execution context components
 */
export enum PacerLogComponent {
    A2A = 'a2a',
    CLIENT = 'client',
    ORCHESTRATION = 'orchestration',
    AGENT = 'agent',
    CONFIG = 'config',
    LLM = 'llm',

    API = 'api',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: PacerLogComponent;
    /** Agent name, so interleaved output from several agent processes stays readable */
    agentId: string;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for full payload dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Log an exception at error level with its name and stack in the context
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports, agentId, and level but uses a different component identifier
     */
    createChild(component: PacerLogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and all child loggers created from it (shared level reference)
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    destroy?(): void | Promise<void>;
};
