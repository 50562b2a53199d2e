/**
 * Process Service
 *
 * Runs shell commands for the process tools. Each command gets its own process group
 * so a timeout or an abort takes down everything it started.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import * as path from 'node:path';
import { LogComponent, abortReason, type Logger } from '@stepwise/core';
import { ProcessError } from './errors.js';
import type { ExecuteOptions, OutputStream, ProcessConfig, ProcessResult } from './types.js';

const TRUNCATION_MARKER = '\n...[truncated]';

function errnoCode(error: Error): string | undefined {
    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Longest prefix of `text` that fits in `maxBytes` of UTF-8 without cutting a character
 */
function sliceToBytes(text: string, maxBytes: number): string {
    let bytes = 0;
    let end = 0;
    for (const char of text) {
        bytes += Buffer.byteLength(char, 'utf8');
        if (bytes > maxBytes) break;
        end += char.length;
    }
    return text.slice(0, end);
}

export class ProcessService {
    private static readonly SIGKILL_TIMEOUT_MS = 200;

    private readonly config: ProcessConfig;
    private readonly logger: Logger;

    constructor(config: ProcessConfig, logger: Logger) {
        this.config = config;
        this.logger = logger.createChild(LogComponent.PROCESS);
    }

    getConfig(): Readonly<ProcessConfig> {
        return this.config;
    }

    /**
     * Run a command to completion. A non-zero exit resolves; a timeout rejects with
     * ProcessError.timeout and an abort rejects with the signal's reason.
     */
    executeCommand(command: string, options: ExecuteOptions = {}): Promise<ProcessResult> {
        if (command.trim() === '') {
            return Promise.reject(ProcessError.invalidCommand(command, 'command is empty'));
        }

        const { abortSignal } = options;
        if (abortSignal?.aborted) {
            this.logger.debug(`Command cancelled before execution: ${command}`);
            return Promise.reject(abortReason(abortSignal));
        }

        const timeout = Math.min(options.timeout ?? this.config.defaultTimeout, this.config.maxTimeout);
        const cwd = path.resolve(this.config.workingDirectory, options.cwd ?? '.');
        const env = this.buildEnvironment();
        const maxBytes = this.config.maxOutputBytes;

        return new Promise<ProcessResult>((resolve, reject) => {
            const startTime = Date.now();
            const output: Record<OutputStream, string> = { stdout: '', stderr: '' };
            let bytesUsed = 0;
            let truncated = false;
            let timedOut = false;
            let aborted = false;
            let closed = false;

            this.logger.debug(`Executing command: ${command}`, { cwd, timeout });

            const child = spawn(command, {
                cwd,
                env,
                shell: true,
                detached: process.platform !== 'win32', // Own process group on Unix
            });

            const timeoutHandle = setTimeout(() => {
                timedOut = true;
                void this.killProcessTree(child);
            }, timeout);

            const abortHandler = () => {
                if (closed) return;
                aborted = true;
                clearTimeout(timeoutHandle);
                this.logger.debug(`Command cancelled: ${command}`);
                void this.killProcessTree(child);
            };
            abortSignal?.addEventListener('abort', abortHandler, { once: true });

            // Decoded per stream so a character split across chunks arrives whole
            const collect = (stream: OutputStream) => (chunk: string) => {
                options.onOutput?.(chunk, stream);
                if (truncated) return;

                const size = Buffer.byteLength(chunk, 'utf8');
                if (bytesUsed + size <= maxBytes) {
                    output[stream] += chunk;
                    bytesUsed += size;
                    return;
                }
                output[stream] += sliceToBytes(chunk, maxBytes - bytesUsed) + TRUNCATION_MARKER;
                bytesUsed = maxBytes;
                truncated = true;
                this.logger.warn(`Output limit of ${maxBytes} bytes reached for command: ${command}`);
            };
            child.stdout?.setEncoding('utf8').on('data', collect('stdout'));
            child.stderr?.setEncoding('utf8').on('data', collect('stderr'));

            const cleanup = () => {
                closed = true;
                clearTimeout(timeoutHandle);
                abortSignal?.removeEventListener('abort', abortHandler);
            };

            child.on('close', (code, signal) => {
                cleanup();
                const duration = Date.now() - startTime;

                if (aborted && abortSignal) {
                    reject(abortReason(abortSignal));
                    return;
                }
                if (timedOut) {
                    reject(ProcessError.timeout(command, timeout, output.stdout + output.stderr));
                    return;
                }

                if (code === null) {
                    output.stderr += `\nProcess terminated by signal ${signal ?? 'UNKNOWN'}`;
                }
                const exitCode = code ?? 1;
                this.logger.debug(
                    `Command completed with exit code ${exitCode} in ${duration}ms: ${command}`
                );
                resolve({
                    stdout: output.stdout,
                    stderr: output.stderr,
                    exitCode,
                    duration,
                    truncated,
                });
            });

            child.on('error', (error) => {
                cleanup();
                const code = errnoCode(error);
                if (code === 'ENOENT') {
                    reject(ProcessError.commandNotFound(command));
                } else if (code === 'EACCES') {
                    reject(ProcessError.permissionDenied(command));
                } else {
                    reject(ProcessError.executionFailed(command, error.message));
                }
            });
        });
    }

    private buildEnvironment(): Record<string, string> {
        const env: Record<string, string> = {};
        for (const [key, value] of Object.entries({ ...process.env, ...this.config.environment })) {
            if (value !== undefined) {
                env[key] = value;
            }
        }
        return env;
    }

    /**
     * Kill a process tree (process group on Unix, taskkill on Windows)
     */
    private async killProcessTree(child: ChildProcess): Promise<void> {
        const pid = child.pid;
        if (pid === undefined) {
            child.kill('SIGTERM');
            return;
        }

        if (process.platform === 'win32') {
            await new Promise<void>((resolve) => {
                const killer = spawn('taskkill', ['/pid', String(pid), '/f', '/t'], {
                    stdio: 'ignore',
                });
                killer.once('exit', () => resolve());
                killer.once('error', () => resolve());
            });
            return;
        }

        try {
            process.kill(-pid, 'SIGTERM');
            await new Promise((res) => setTimeout(res, ProcessService.SIGKILL_TIMEOUT_MS));
            if (child.exitCode === null && child.signalCode === null) {
                process.kill(-pid, 'SIGKILL');
            }
        } catch (error) {
            // Group already gone or not ours; fall back to the direct child
            this.logger.debug(`Process group kill failed for ${pid}: ${String(error)}`);
            child.kill('SIGKILL');
        }
    }
}
