import { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { AgentErrorCode } from './error-codes.js';

/**
 * Agent error factory with typed methods for creating agent-specific errors
 */
export class AgentError {
    /**
     * Prompt submitted while the queue is at capacity
     */
    static queueFull(capacity: number) {
        return new StepwiseRuntimeError(
            AgentErrorCode.QUEUE_FULL,
            ErrorScope.AGENT,
            ErrorType.CONFLICT,
            `Prompt queue is full (capacity ${capacity})`,
            { capacity },
            'Wait for the current cycle to finish or clear the queue'
        );
    }

    static disposed() {
        return new StepwiseRuntimeError(
            AgentErrorCode.DISPOSED,
            ErrorScope.AGENT,
            ErrorType.USER,
            'Agent loop has been disposed'
        );
    }

    /**
     * Abort reason of a cycle stopped by `cancel()` or `dispose()`
     */
    static cancelled(promptId: string) {
        return new StepwiseRuntimeError(
            AgentErrorCode.CANCELLED,
            ErrorScope.AGENT,
            ErrorType.CANCELLED,
            'Cycle cancelled by user',
            { promptId }
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>) {
        return new StepwiseRuntimeError(
            AgentErrorCode.INVALID_CONFIG,
            ErrorScope.AGENT,
            ErrorType.USER,
            `Invalid agent configuration: ${message}`,
            context
        );
    }

    /**
     * Unexpected failure inside a cycle that no component reported as a runtime error
     */
    static cycleFailed(message: string, cause?: unknown) {
        return new StepwiseRuntimeError(
            AgentErrorCode.CYCLE_FAILED,
            ErrorScope.AGENT,
            ErrorType.SYSTEM,
            `Prompt cycle failed: ${message}`,
            cause !== undefined ? { cause } : undefined
        );
    }
}
