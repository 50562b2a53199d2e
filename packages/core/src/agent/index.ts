export { AgentLoop } from './agent-loop.js';
export type { AgentLoopOptions } from './agent-loop.js';
export { PromptQueue } from './prompt-queue.js';
export type { PromptQueueOptions } from './prompt-queue.js';
export {
    AgentLoopConfigSchema,
    PromptQueueConfigSchema,
    StreamConfigSchema,
    DEFAULT_CONTEXT_WINDOW,
    DEFAULT_MAX_TURNS,
    DEFAULT_QUEUE_CAPACITY,
    DEFAULT_TOOL_CALL_IDLE_TIMEOUT_MS,
} from './schemas.js';
export type { AgentLoopConfig, ValidatedAgentLoopConfig } from './schemas.js';
export type { CycleResult, QueuedPrompt } from './types.js';
export { AgentError } from './errors.js';
export { AgentErrorCode } from './error-codes.js';
