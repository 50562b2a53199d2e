import { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 */
export class LoggerError {
    static unknownTransportType(transportType: string): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>): StepwiseRuntimeError {
        return new StepwiseRuntimeError(
            LoggerErrorCode.INVALID_CONFIG,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid logger configuration: ${message}`,
            context
        );
    }
}
