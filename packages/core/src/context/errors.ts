import { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ContextErrorCode } from './error-codes.js';

/**
 * Context error factory with typed methods for creating context-specific errors
 */
export class ContextError {
    /**
     * Compaction could not bring the conversation under budget
     */
    static overflowUnrecoverable(estimate: number, budget: number) {
        return new StepwiseRuntimeError(
            ContextErrorCode.OVERFLOW_UNRECOVERABLE,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            `Conversation needs ${estimate} tokens but the budget is ${budget} and nothing is left to compact`,
            { estimate, budget },
            [
                'Start a new conversation',
                'Reduce preserveLastNTurns or raise contextWindow',
            ]
        );
    }

    /**
     * Overflow policy 'stop' halted the cycle before calling the provider
     */
    static overflowHalted(estimate: number, budget: number) {
        return new StepwiseRuntimeError(
            ContextErrorCode.OVERFLOW_HALTED,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            `Conversation needs ${estimate} tokens which exceeds the budget of ${budget}`,
            { estimate, budget },
            "Set compaction.onOverflow to 'continue' or start a new conversation"
        );
    }

    static invalidRange(start: number, end: number, length: number) {
        return new StepwiseRuntimeError(
            ContextErrorCode.INVALID_RANGE,
            ErrorScope.CONTEXT,
            ErrorType.SYSTEM,
            `Invalid message range [${start}, ${end}) for conversation of ${length} messages`,
            { start, end, length }
        );
    }

    static systemMessageProtected() {
        return new StepwiseRuntimeError(
            ContextErrorCode.SYSTEM_MESSAGE_PROTECTED,
            ErrorScope.CONTEXT,
            ErrorType.SYSTEM,
            'The leading system message cannot be replaced'
        );
    }
}
