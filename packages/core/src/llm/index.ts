export * from './types.js';
export * from './services/index.js';
export * from './stream/index.js';
export { LLMConfigSchema, LLMConfigBaseSchema, DEFAULT_RETRY_DELAYS_MS } from './schemas.js';
export type { LLMConfig, ValidatedLLMConfig } from './schemas.js';
export { LLMError } from './errors.js';
export { LLMErrorCode } from './error-codes.js';
export { OpenAIChatMessageFormatter } from './formatters/openai-chat.js';
export { OpenAIResponsesMessageFormatter } from './formatters/openai-responses.js';
export { TurnEngine, parseToolArguments } from './executor/turn-engine.js';
export type { SealedTurn, TurnEngineOptions, TurnState } from './executor/turn-engine.js';
