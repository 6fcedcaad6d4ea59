/**
 * Pacer Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging, component-based categorization, and per-agent isolation.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
import { PacerLogComponent } from './types.js';

export interface PacerLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: PacerLogComponent;
    agentId: string;
    transports: LoggerTransport[];
}

/** Mutable holder so a parent and its children observe the same level */
interface LevelRef {
    current: LogLevel;
}

/**
 * PacerLogger - Multi-transport logger with structured logging
 */
export class PacerLogger implements Logger {
    private levelRef: LevelRef;
    private component: PacerLogComponent;
    private agentId: string;
    private transports: LoggerTransport[];

    // Following Winston convention: lower number = more severe
    // If level is 'debug', logs error(0), warn(1), info(2), debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: PacerLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.agentId = config.agentId;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    silly(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('silly')) {
            this.log('silly', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            agentId: this.agentId,
            context,
        };

        for (const transport of this.transports) {
            try {
                const written = transport.write(entry);
                if (written instanceof Promise) {
                    written.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A failing transport must not break the caller
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return PacerLogger.LEVELS[level] <= PacerLogger.LEVELS[this.levelRef.current];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level but uses a different component identifier
     */
    createChild(component: PacerLogComponent): PacerLogger {
        return new PacerLogger(
            {
                level: this.levelRef.current,
                component,
                agentId: this.agentId,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}

export { PacerLogComponent };
