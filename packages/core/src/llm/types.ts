import type { StepwiseRuntimeError } from '../errors/runtime-error.js';
import type { ConversationMessage } from '../context/types.js';

export const LLM_PROVIDERS = ['openai-chat', 'openai-responses', 'mock'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

/**
 * Why the provider stopped generating
 */
export type FinishReason = 'stop' | 'length' | 'tool-calls' | 'other';

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    /** Portion of inputTokens served from the provider's prompt cache */
    cachedInputTokens: number;
}

/**
 * Atomic unit of provider output, normalized across wire formats.
 * Tool-call argument fragments are only complete once `tool-call-end` arrives.
 */
export type StreamPart =
    | { type: 'thinking-delta'; delta: string; signature?: string | undefined }
    | { type: 'text-delta'; delta: string }
    | { type: 'tool-call-start'; toolCallId: string; toolName: string }
    | { type: 'tool-call-delta'; toolCallId: string; delta: string }
    | { type: 'tool-call-end'; toolCallId: string }
    | { type: 'stream-done'; finishReason: FinishReason; usage?: TokenUsage | undefined }
    | { type: 'stream-error'; error: StepwiseRuntimeError };

export type StreamPartType = StreamPart['type'];

/**
 * Function tool definition handed to providers
 */
export interface ToolDefinition {
    name: string;
    description: string;
    /** JSON Schema of the tool input */
    parameters: Record<string, unknown>;
}

/**
 * Reported before each connection retry wait
 */
export interface RetryInfo {
    attempt: number;
    totalAttempts: number;
    delayMs: number;
    error: StepwiseRuntimeError;
}

export interface LLMStreamRequest {
    messages: readonly ConversationMessage[];
    tools: readonly ToolDefinition[];
    systemPrompt?: string | undefined;
    /** Overrides the configured output cap for this call */
    maxOutputTokens?: number | undefined;
    onRetry?: ((info: RetryInfo) => void) | undefined;
}

/**
 * Streaming generation capability.
 *
 * The returned iterable is lazy, finite and not restartable. It never throws:
 * transport failures arrive as a single `stream-error` part that ends the sequence.
 */
export interface LLMProvider {
    readonly name: string;
    readonly model: string;
    stream(request: LLMStreamRequest, signal: AbortSignal): AsyncIterable<StreamPart>;
}

export function emptyUsage(): TokenUsage {
    return { inputTokens: 0, outputTokens: 0, cachedInputTokens: 0 };
}

export function addUsage(total: TokenUsage, next: TokenUsage | undefined): TokenUsage {
    if (!next) return total;
    return {
        inputTokens: total.inputTokens + next.inputTokens,
        outputTokens: total.outputTokens + next.outputTokens,
        cachedInputTokens: total.cachedInputTokens + next.cachedInputTokens,
    };
}
