/**
 * Context-specific error codes
 * Covers conversation state integrity and compaction
 */
export enum ContextErrorCode {
    // Compaction
    OVERFLOW_UNRECOVERABLE = 'context_overflow_unrecoverable',
    OVERFLOW_HALTED = 'context_overflow_halted',

    // Conversation state
    INVALID_RANGE = 'context_invalid_range',
    SYSTEM_MESSAGE_PROTECTED = 'context_system_message_protected',
}
