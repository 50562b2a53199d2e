import type { FinishReason, TokenUsage } from '../llm/types.js';

/**
 * Assistant content block. Thinking blocks keep the provider field they came from
 * as `signature` so they can be sent back the same way.
 */
export type ContentBlock =
    | { readonly type: 'text'; readonly text: string }
    | { readonly type: 'thinking'; readonly text: string; readonly signature?: string | undefined };

/**
 * Tool call as recorded on an assistant message.
 * `arguments` is the JSON text sent back to the provider.
 */
export interface AssistantToolCall {
    readonly id: string;
    readonly name: string;
    readonly arguments: string;
}

interface MessageRecord {
    /** Stable identifier assigned on append */
    readonly id: string;
    /** Epoch milliseconds assigned on append */
    readonly timestamp: number;
}

export interface SystemMessage extends MessageRecord {
    readonly role: 'system';
    readonly content: string;
}

export interface UserMessage extends MessageRecord {
    readonly role: 'user';
    readonly content: string;
}

export interface AssistantMessageMetadata {
    /** Set on the synthesized summary that replaces a compacted prefix */
    readonly isSummary?: boolean | undefined;
    /** Number of messages the summary replaced */
    readonly summarizedMessages?: number | undefined;
}

export interface AssistantMessage extends MessageRecord {
    readonly role: 'assistant';
    readonly content: readonly ContentBlock[];
    readonly toolCalls: readonly AssistantToolCall[];
    readonly usage?: TokenUsage | undefined;
    readonly finishReason?: FinishReason | undefined;
    readonly metadata?: AssistantMessageMetadata | undefined;
}

export interface ToolMessage extends MessageRecord {
    readonly role: 'tool';
    readonly toolCallId: string;
    readonly toolName: string;
    readonly content: string;
    readonly isError: boolean;
}

export type ConversationMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = ConversationMessage['role'];

/**
 * A message before it enters the conversation (no id or timestamp yet)
 */
export type MessageDraft<T extends ConversationMessage = ConversationMessage> = T extends unknown
    ? Omit<T, 'id' | 'timestamp'>
    : never;

/**
 * Snapshot of the conversation that `restore` can return to.
 * Messages are immutable, so holding the references is enough.
 */
export interface ConversationCheckpoint {
    readonly length: number;
    readonly messages: readonly ConversationMessage[];
}

/**
 * Pluggable token estimator used for budget decisions.
 * Accepts drafts so callers can estimate a candidate history before committing it.
 */
export interface TokenEstimator {
    estimate(messages: readonly MessageDraft[]): number;
}
