export { CompactionEngine } from './engine.js';
export type { CompactionEngineOptions } from './engine.js';
export { CompactionConfigSchema, OVERFLOW_POLICIES } from './schemas.js';
export type { CompactionConfig, CompactionConfigInput, OverflowPolicy } from './schemas.js';
export { decideCompaction, getBudget, isOverflow } from './overflow.js';
export type { CompactionDecision } from './overflow.js';
export { findCompactableRange, isSummary } from './split.js';
export {
    LLMSummarizer,
    createFallbackSummary,
    formatMessagesForSummary,
    DEFAULT_SUMMARY_PROMPT,
    SUMMARY_HEADER,
} from './summarizer.js';
export type { LLMSummarizerOptions } from './summarizer.js';
export type { CompactionOutcome, MessageRange, SummarizeOptions, Summarizer } from './types.js';
