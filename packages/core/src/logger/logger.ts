/**
 * Stepwise Logger
 *
 * Main logger implementation with multi-transport support.
 * Supports structured logging, component-based categorization, and per-agent isolation.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';

/**
 * Level holder shared between a logger and every child created from it
 */
interface LevelRef {
    current: LogLevel;
}

export interface StepwiseLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    /** Component identifier */
    component: LogComponent;
    /** Agent ID for multi-agent isolation */
    agentId: string;
    /** Transport instances */
    transports: LoggerTransport[];
}

/**
 * StepwiseLogger - Multi-transport logger with structured logging
 */
export class StepwiseLogger implements Logger {
    private readonly levelRef: LevelRef;
    private readonly component: LogComponent;
    private readonly agentId: string;
    private readonly transports: LoggerTransport[];

    // If level is 'debug', logs error(0), warn(1), info(2), debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: StepwiseLoggerConfig, levelRef?: LevelRef) {
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
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // A broken transport must not break logging for the others
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return StepwiseLogger.LEVELS[level] <= StepwiseLogger.LEVELS[this.levelRef.current];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level reference
     */
    createChild(component: LogComponent): StepwiseLogger {
        return new StepwiseLogger(
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

    getLogFilePath(): string | null {
        for (const transport of this.transports) {
            if (transport instanceof FileTransport) {
                return transport.getFilePath();
            }
        }
        return null;
    }

    /**
     * Cleanup all transports
     */
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
