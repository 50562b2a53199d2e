export { ConversationState } from './conversation-state.js';
export { CharRatioTokenEstimator, estimateTextTokens } from './token-estimator.js';
export { ContextError } from './errors.js';
export { ContextErrorCode } from './error-codes.js';
export type {
    AssistantMessage,
    AssistantMessageMetadata,
    AssistantToolCall,
    ContentBlock,
    ConversationCheckpoint,
    ConversationMessage,
    MessageDraft,
    MessageRole,
    SystemMessage,
    TokenEstimator,
    ToolMessage,
    UserMessage,
} from './types.js';
export * from './compaction/index.js';
