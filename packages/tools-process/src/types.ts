/**
 * Process Service Types
 */

/**
 * Resolved service configuration
 */
export interface ProcessConfig {
    workingDirectory: string;
    defaultTimeout: number;
    maxTimeout: number;
    /** Combined stdout and stderr kept per command, in bytes */
    maxOutputBytes: number;
    /** Extra variables layered over process.env */
    environment: Record<string, string>;
}

export type OutputStream = 'stdout' | 'stderr';

export interface ExecuteOptions {
    /** Working directory, relative to the configured one */
    cwd?: string | undefined;
    /** Timeout in milliseconds, clamped to maxTimeout */
    timeout?: number | undefined;
    /** Kills the process group when aborted */
    abortSignal?: AbortSignal | undefined;
    /** Called for every chunk the command writes */
    onOutput?: ((chunk: string, stream: OutputStream) => void) | undefined;
}

export interface ProcessResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    /** Milliseconds from spawn to close */
    duration: number;
    /** True when output past maxOutputBytes was dropped */
    truncated: boolean;
}
