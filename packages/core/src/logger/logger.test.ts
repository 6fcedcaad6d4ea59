import { describe, it, expect, vi, afterEach } from 'vitest';
import { PacerLogger } from './pacer-logger.js';
import { createLogger, parseLoggerConfig } from './factory.js';
import { ConsoleTransport } from './transports/console-transport.js';
import type { LogEntry, LoggerTransport } from './types.js';
import { PacerLogComponent } from './types.js';
import { PacerRuntimeError } from '../errors/runtime-error.js';
import { LoggerErrorCode } from './error-codes.js';

class MemoryTransport implements LoggerTransport {
    entries: LogEntry[] = [];
    write(entry: LogEntry): void {
        this.entries.push(entry);
    }
}

function createTestLogger(level: 'info' | 'debug' | 'error' = 'info') {
    const transport = new MemoryTransport();
    const logger = new PacerLogger({
        level,
        component: PacerLogComponent.A2A,
        agentId: 'test-agent',
        transports: [transport],
    });
    return { logger, transport };
}

describe('PacerLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes structured entries with component and agent id', () => {
        const { logger, transport } = createTestLogger();

        logger.info('task accepted', { taskId: 't-1' });

        expect(transport.entries).toHaveLength(1);
        const [entry] = transport.entries;
        expect(entry?.level).toBe('info');
        expect(entry?.message).toBe('task accepted');
        expect(entry?.component).toBe(PacerLogComponent.A2A);
        expect(entry?.agentId).toBe('test-agent');
        expect(entry?.context).toEqual({ taskId: 't-1' });
    });

    it('drops entries below the configured level', () => {
        const { logger, transport } = createTestLogger('info');

        logger.debug('hidden');
        logger.silly('hidden too');
        logger.warn('shown');

        expect(transport.entries.map((e) => e.message)).toEqual(['shown']);
    });

    it('shares level and transports with child loggers', () => {
        const { logger, transport } = createTestLogger('info');
        const child = logger.createChild(PacerLogComponent.CLIENT);

        child.debug('before');
        logger.setLevel('debug');
        child.debug('after');

        expect(child.getLevel()).toBe('debug');
        expect(transport.entries).toHaveLength(1);
        expect(transport.entries[0]?.message).toBe('after');
        expect(transport.entries[0]?.component).toBe(PacerLogComponent.CLIENT);
    });

    it('records exceptions at error level', () => {
        const { logger, transport } = createTestLogger('error');

        logger.trackException(new TypeError('bad payload'), { taskId: 't-2' });

        expect(transport.entries[0]?.level).toBe('error');
        expect(transport.entries[0]?.message).toBe('bad payload');
        expect(transport.entries[0]?.context).toMatchObject({
            taskId: 't-2',
            errorName: 'TypeError',
            errorType: 'TypeError',
        });
    });

    it('keeps logging when one transport throws', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const healthy = new MemoryTransport();
        const logger = new PacerLogger({
            level: 'info',
            component: PacerLogComponent.AGENT,
            agentId: 'test-agent',
            transports: [
                {
                    write: () => {
                        throw new Error('disk full');
                    },
                },
                healthy,
            ],
        });

        logger.info('still here');

        expect(healthy.entries).toHaveLength(1);
        expect(consoleError).toHaveBeenCalledTimes(1);
    });
});

describe('ConsoleTransport', () => {
    it('formats level, component and agent id without colour', () => {
        const transport = new ConsoleTransport({ colorize: false });
        const entry: LogEntry = {
            level: 'warn',
            message: 'retrying',
            timestamp: '2024-01-01T10:00:00.000Z',
            component: PacerLogComponent.CLIENT,
            agentId: 'orchestrator',
        };

        const line = transport.format(entry);

        expect(line.endsWith('[WARN] [client:orchestrator] retrying')).toBe(true);
    });

    it('appends context as JSON', () => {
        const transport = new ConsoleTransport({ colorize: false });
        const line = transport.format({
            level: 'info',
            message: 'sent',
            timestamp: '2024-01-01T10:00:00.000Z',
            component: PacerLogComponent.CLIENT,
            agentId: 'orchestrator',
            context: { attempt: 2 },
        });

        expect(line.split('\n').slice(1).join('\n')).toBe(JSON.stringify({ attempt: 2 }, null, 2));
    });
});

describe('createLogger', () => {
    it('applies defaults', () => {
        const config = parseLoggerConfig();
        expect(config.level).toBe('info');
        expect(config.transports).toEqual([{ type: 'console', colorize: true }]);
    });

    it('builds a logger at the configured level', () => {
        const logger = createLogger({
            config: { level: 'debug', transports: [{ type: 'silent' }] },
            agentId: 'planner',
        });
        expect(logger.getLevel()).toBe('debug');
    });

    it('rejects invalid configuration with a typed error', () => {
        let caught: unknown;
        try {
            parseLoggerConfig({ transports: [] });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(PacerRuntimeError);
        expect(caught).toMatchObject({ code: LoggerErrorCode.INVALID_CONFIG });
    });
});
