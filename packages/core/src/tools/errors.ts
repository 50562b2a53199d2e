import { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ToolErrorCode } from './error-codes.js';

/**
 * Tool error factory with typed methods for creating tool-specific errors
 * Each method creates a properly typed StepwiseRuntimeError with TOOLS scope
 */
export class ToolError {
    /**
     * Tool not found error
     */
    static notFound(toolName: string) {
        return new StepwiseRuntimeError(
            ToolErrorCode.TOOL_NOT_FOUND,
            ErrorScope.TOOLS,
            ErrorType.NOT_FOUND,
            `Unknown tool: ${toolName}`,
            { toolName }
        );
    }

    static alreadyRegistered(toolName: string) {
        return new StepwiseRuntimeError(
            ToolErrorCode.TOOL_ALREADY_REGISTERED,
            ErrorScope.TOOLS,
            ErrorType.CONFLICT,
            `Tool '${toolName}' is already registered`,
            { toolName }
        );
    }

    /**
     * Arguments were not valid JSON or did not match the tool's input schema
     */
    static invalidArgs(toolName: string, reason: string) {
        return new StepwiseRuntimeError(
            ToolErrorCode.TOOL_INVALID_ARGS,
            ErrorScope.TOOLS,
            ErrorType.USER,
            `Invalid arguments for tool '${toolName}': ${reason}`,
            { toolName, reason }
        );
    }

    /**
     * Tool execution failed
     */
    static executionFailed(toolName: string, reason: string) {
        return new StepwiseRuntimeError(
            ToolErrorCode.EXECUTION_FAILED,
            ErrorScope.TOOLS,
            ErrorType.SYSTEM,
            `Tool '${toolName}' execution failed: ${reason}`,
            { toolName, reason }
        );
    }

    /**
     * Tool execution timeout
     */
    static executionTimeout(toolName: string, timeoutMs: number) {
        const message =
            timeoutMs > 0
                ? `Tool '${toolName}' execution timed out after ${timeoutMs}ms`
                : `Tool '${toolName}' execution timed out`;
        return new StepwiseRuntimeError(
            ToolErrorCode.EXECUTION_TIMEOUT,
            ErrorScope.TOOLS,
            ErrorType.TIMEOUT,
            message,
            { toolName, timeoutMs }
        );
    }

    /**
     * Tool call was cancelled before or during execution
     */
    static cancelled(toolName: string) {
        return new StepwiseRuntimeError(
            ToolErrorCode.EXECUTION_CANCELLED,
            ErrorScope.TOOLS,
            ErrorType.CANCELLED,
            `Tool '${toolName}' was cancelled`,
            { toolName }
        );
    }
}
