/**
 * Logger Factory
 *
 * Creates logger instances from validated configuration.
 */

import type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
import { LoggerConfigSchema } from './schemas.js';
import type { Logger, LoggerTransport } from './types.js';
import { PacerLogComponent } from './types.js';
import { PacerLogger } from './pacer-logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    /** Logger configuration; validated and defaulted here */
    config?: LoggerConfigInput;
    agentId: string;
    /** Component identifier (defaults to AGENT) */
    component?: PacerLogComponent;
}

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();
        case 'console':
            return new ConsoleTransport({ colorize: config.colorize });
    }
}

export function parseLoggerConfig(input: LoggerConfigInput = {}): LoggerConfig {
    const parsed = LoggerConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw LoggerError.invalidConfig(
            parsed.error.issues.map((issue) => issue.message).join('; '),
            { issues: parsed.error.issues }
        );
    }
    return parsed.data;
}

/**
 * Create a logger instance from configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'debug' },
 *   agentId: 'biomechanics-lab',
 * });
 *
 * logger.info('Agent started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { agentId, component = PacerLogComponent.AGENT } = options;
    const config = parseLoggerConfig(options.config);

    return new PacerLogger({
        level: config.level,
        component,
        agentId,
        transports: config.transports.map(createTransport),
    });
}
