/**
 * Tools-specific error codes
 * Includes resolution, argument validation and execution errors
 */
export enum ToolErrorCode {
    // Resolution
    TOOL_NOT_FOUND = 'tools_tool_not_found',
    TOOL_ALREADY_REGISTERED = 'tools_already_registered',

    // Validation (pre-execution)
    TOOL_INVALID_ARGS = 'tools_invalid_args',

    // Execution
    EXECUTION_FAILED = 'tools_execution_failed',
    EXECUTION_TIMEOUT = 'tools_execution_timeout',
    EXECUTION_CANCELLED = 'tools_execution_cancelled',
}
