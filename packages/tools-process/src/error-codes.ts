/**
 * Process tool error codes
 */
export enum ProcessErrorCode {
    INVALID_COMMAND = 'process_invalid_command',
    COMMAND_NOT_FOUND = 'process_command_not_found',
    PERMISSION_DENIED = 'process_permission_denied',
    EXECUTION_FAILED = 'process_execution_failed',
    TIMEOUT = 'process_timeout',
}
