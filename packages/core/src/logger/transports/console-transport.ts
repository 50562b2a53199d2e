/**
 * Console Transport
 *
 * Logs to stderr, or splits by level between stdout and stderr, with optional chalk colors.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export type ConsoleOutput = 'stderr' | 'split';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** 'split' writes debug and info to stdout (default: 'stderr') */
    output?: ConsoleOutput;
}

/**
 * Console transport for terminal output
 */
export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;
    private output: ConsoleOutput;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.output = config.output ?? 'stderr';
    }

    write(entry: LogEntry): void {
        const message = this.format(entry);

        if (this.output === 'stderr' || entry.level === 'error' || entry.level === 'warn') {
            console.error(message);
        } else {
            console.log(message);
        }
    }

    format(entry: LogEntry): string {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        const component = `[${entry.component}:${entry.agentId}]`;
        const levelLabel = `[${entry.level.toUpperCase()}]`;

        let message = `${timestamp} ${levelLabel} ${component} ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            message += '\n' + JSON.stringify(entry.context, null, 2);
        }

        return message;
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'debug':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
            default:
                return (s: string) => s;
        }
    }
}
