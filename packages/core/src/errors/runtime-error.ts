import { ErrorScope, ErrorType, type StepwiseErrorCode } from './types.js';

/**
 * Serialized form of a runtime error, safe to hand to event consumers or write to a log
 */
export interface SerializedRuntimeError {
    code: StepwiseErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    context?: Record<string, unknown> | undefined;
    recovery?: string | string[] | undefined;
}

/**
 * Runtime error with a stable code, a functional scope and an error type.
 * Domain factories (`ToolError`, `LLMError`, ...) are the only intended constructors.
 */
export class StepwiseRuntimeError<C = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: StepwiseErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
        this.name = 'StepwiseRuntimeError';
    }

    toJSON(): SerializedRuntimeError {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            ...(isRecord(this.context) && { context: this.context }),
            ...(this.recovery !== undefined && { recovery: this.recovery }),
        };
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown thrown value to a runtime error of the given scope
 */
export function isRuntimeError(
    error: unknown,
    scope?: ErrorScope | string
): error is StepwiseRuntimeError {
    return (
        error instanceof StepwiseRuntimeError && (scope === undefined || error.scope === scope)
    );
}
