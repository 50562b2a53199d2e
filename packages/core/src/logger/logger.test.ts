import { describe, it, expect, vi, afterEach } from 'vitest';
import { StepwiseLogger } from './logger.js';
import { createLogger } from './factory.js';
import { LoggerConfigSchema } from './schemas.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { LogComponent, type LogEntry, type LoggerTransport } from './types.js';

function capture(): LoggerTransport & { entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    return { entries, write: (entry) => void entries.push(entry) };
}

describe('StepwiseLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should drop entries below the configured level', () => {
        const transport = capture();
        const logger = new StepwiseLogger({
            level: 'info',
            component: LogComponent.AGENT,
            agentId: 'test-agent',
            transports: [transport],
        });

        logger.debug('hidden');
        logger.info('shown', { turn: 1 });

        expect(transport.entries).toHaveLength(1);
        expect(transport.entries[0]).toMatchObject({
            level: 'info',
            message: 'shown',
            component: 'agent',
            agentId: 'test-agent',
            context: { turn: 1 },
        });
    });

    it('should share the level with child loggers', () => {
        const transport = capture();
        const logger = new StepwiseLogger({
            level: 'warn',
            component: LogComponent.AGENT,
            agentId: 'test-agent',
            transports: [transport],
        });
        const child = logger.createChild(LogComponent.TOOLS);

        child.info('before');
        logger.setLevel('debug');
        child.debug('after');

        expect(child.getLevel()).toBe('debug');
        expect(transport.entries.map((e) => [e.component, e.message])).toEqual([
            ['tools', 'after'],
        ]);
    });

    it('should keep writing to other transports when one throws', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const broken: LoggerTransport = {
            write: () => {
                throw new Error('disk full');
            },
        };
        const transport = capture();
        const logger = new StepwiseLogger({
            level: 'error',
            component: LogComponent.AGENT,
            agentId: 'test-agent',
            transports: [broken, transport],
        });

        logger.error('still delivered');

        expect(transport.entries).toHaveLength(1);
    });

    it('should record error details on trackException', () => {
        const transport = capture();
        const logger = new StepwiseLogger({
            level: 'error',
            component: LogComponent.LLM,
            agentId: 'test-agent',
            transports: [transport],
        });

        logger.trackException(new TypeError('bad input'), { turn: 2 });

        expect(transport.entries[0]?.message).toBe('bad input');
        expect(transport.entries[0]?.context).toMatchObject({
            turn: 2,
            errorName: 'TypeError',
            errorType: 'TypeError',
        });
    });
});

describe('createLogger', () => {
    it('should default to the error level', () => {
        const logger = createLogger({ agentId: 'test-agent', config: { transports: [{ type: 'silent' }] } });

        expect(logger.getLevel()).toBe('error');
        expect(logger.getLogFilePath()).toBeNull();
    });

    it('should reject invalid configuration', () => {
        expect(() => createLogger({ agentId: 'test-agent', config: { transports: [] } })).toThrow(
            /^Invalid logger configuration: /
        );
    });
});

describe('ConsoleTransport', () => {
    const entry = (level: LogEntry['level']): LogEntry => ({
        level,
        message: 'hello',
        timestamp: new Date(0).toISOString(),
        component: LogComponent.AGENT,
        agentId: 'test-agent',
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should keep every level off stdout by default', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const transport = new ConsoleTransport({ colorize: false });

        transport.write(entry('info'));
        transport.write(entry('debug'));

        expect(log).not.toHaveBeenCalled();
        expect(error).toHaveBeenCalledTimes(2);
    });

    it('should send debug and info to stdout when split', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const transport = new ConsoleTransport({ colorize: false, output: 'split' });

        transport.write(entry('info'));
        transport.write(entry('warn'));

        expect(log).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledTimes(1);
    });

    it('should default the console transport to stderr', () => {
        expect(LoggerConfigSchema.parse({}).transports).toEqual([
            { type: 'console', colorize: true, output: 'stderr' },
        ]);
        expect(
            LoggerConfigSchema.parse({ transports: [{ type: 'console' }] }).transports[0]
        ).toEqual({ type: 'console', colorize: true, output: 'stderr' });
    });
});
