import type { z, ZodTypeAny } from 'zod';
import type { Logger } from '../logger/types.js';

export type ToolCallStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

/**
 * A tool invocation requested by the model.
 * `arguments` is parsed once the provider signals the end of the call; a payload that is
 * not a JSON object leaves it `{}` and records `argumentsError`.
 */
export interface ToolCall {
    readonly id: string;
    readonly name: string;
    readonly rawArguments: string;
    readonly arguments: Record<string, unknown>;
    readonly argumentsError?: string | undefined;
    readonly status: ToolCallStatus;
}

export type ToolFailureKind = 'unknown-tool' | 'execution-error' | 'timeout' | 'cancelled';

export interface ToolResultError {
    kind: ToolFailureKind;
    code: string;
    message: string;
}

/**
 * Outcome of one dispatched tool call
 */
export interface ToolResult {
    readonly toolCallId: string;
    readonly toolName: string;
    readonly success: boolean;
    /** Text fed back to the model */
    readonly output: string;
    /** Raw value returned by the tool, when it succeeded */
    readonly data?: unknown;
    readonly error?: ToolResultError | undefined;
}

/**
 * Context passed to tool execution
 */
export interface ToolExecutionContext {
    toolCallId: string;
    /** Aborted on cancellation or idle timeout */
    abortSignal: AbortSignal;
    /** Signals incremental progress; resets the idle timeout */
    reportProgress(): void;
    logger: Logger;
}

/**
 * Tool definition. Input is validated against `inputSchema` before `execute` runs.
 */
export interface Tool<TSchema extends ZodTypeAny = ZodTypeAny> {
    /** Unique identifier exposed to the model */
    id: string;
    description: string;
    /** Additional names the registry resolves to this tool */
    aliases?: readonly string[] | undefined;
    inputSchema: TSchema;
    execute(input: z.output<TSchema>, context: ToolExecutionContext): Promise<unknown> | unknown;
}
