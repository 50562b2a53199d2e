import type { AgentErrorCode } from '../agent/error-codes.js';
import type { ContextErrorCode } from '../context/error-codes.js';
import type { LLMErrorCode } from '../llm/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { ToolErrorCode } from '../tools/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    LLM = 'llm', // Provider streams, wire adapters, connection retries
    AGENT = 'agent', // Agentic loop lifecycle and prompt queue
    CONFIG = 'config', // Configuration validation
    CONTEXT = 'context', // Conversation state, token estimation, compaction
    TOOLS = 'tools', // Tool resolution, dispatch and execution
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    FILESYSTEM = 'filesystem', // File tools
    PROCESS = 'process', // Shell tools
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (tool, file, etc.)
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, concurrent operation
    RATE_LIMIT = 'rate_limit', // 429 - too many requests
    CANCELLED = 'cancelled', // 499 - aborted by the caller
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream provider failures, API errors
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 * Tool packages define their own code enums and widen with `string`
 */
export type StepwiseErrorCode =
    | LLMErrorCode
    | AgentErrorCode
    | ContextErrorCode
    | ToolErrorCode
    | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: StepwiseErrorCode | string;
    message: string;
    scope: ErrorScope | string; // Domain that generated this issue
    type: ErrorType; // HTTP status mapping
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
