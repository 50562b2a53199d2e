/**
 * Agent-specific error codes
 * Includes loop lifecycle and prompt queue errors
 */
export enum AgentErrorCode {
    QUEUE_FULL = 'agent_queue_full',
    DISPOSED = 'agent_disposed',
    CYCLE_FAILED = 'agent_cycle_failed',
    CANCELLED = 'agent_cancelled',
    INVALID_CONFIG = 'agent_invalid_config',
}
