/**
 * Process Service Errors
 */

import { StepwiseRuntimeError, ErrorScope, ErrorType } from '@stepwise/core';
import { ProcessErrorCode } from './error-codes.js';

/**
 * Factory class for creating process-related errors
 */
export class ProcessError {
    private constructor() {}

    static invalidCommand(command: string, reason: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            ProcessErrorCode.INVALID_COMMAND,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Invalid command: ${reason}`,
            { command, reason }
        );
    }

    static commandNotFound(command: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            ProcessErrorCode.COMMAND_NOT_FOUND,
            ErrorScope.PROCESS,
            ErrorType.NOT_FOUND,
            `Command not found: ${command}`,
            { command }
        );
    }

    static permissionDenied(command: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            ProcessErrorCode.PERMISSION_DENIED,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Permission denied: ${command}`,
            { command }
        );
    }

    static executionFailed(command: string, cause: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            ProcessErrorCode.EXECUTION_FAILED,
            ErrorScope.PROCESS,
            ErrorType.SYSTEM,
            `Command execution failed: ${cause}`,
            { command, cause }
        );
    }

    /**
     * Command ran past its timeout and was killed
     */
    static timeout(command: string, timeout: number, output: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            ProcessErrorCode.TIMEOUT,
            ErrorScope.PROCESS,
            ErrorType.TIMEOUT,
            `Command timed out after ${timeout}ms: ${command}`,
            { command, timeout, output },
            'Increase the timeout or run a shorter command'
        );
    }
}
