import type { ChatCompletionChunk } from 'openai/resources';
import { nanoid } from 'nanoid';
import type { FinishReason, StreamPart, TokenUsage } from '../types.js';
import { LLMError } from '../errors.js';
import { toTransportError } from './transport-error.js';

/** Delta fields that carry reasoning text, in order of preference */
export const CHAT_REASONING_FIELDS = ['reasoning_content', 'reasoning', 'reasoning_text'] as const;

export interface ChatStreamOptions {
    /** Provider name used in error messages */
    provider?: string | undefined;
}

interface WireToolCall {
    id: string | undefined;
    name: string | undefined;
    /** Argument fragments received before the name */
    pendingArguments: string;
    started: boolean;
    ended: boolean;
}

type ChunkDelta = ChatCompletionChunk.Choice.Delta;

function readReasoning(delta: ChunkDelta): { text: string; field: string } | undefined {
    for (const field of CHAT_REASONING_FIELDS) {
        if (field in delta) {
            const value: unknown = Reflect.get(delta, field);
            if (typeof value === 'string' && value !== '') {
                return { text: value, field };
            }
        }
    }
    return undefined;
}

export function mapChatFinishReason(reason: string | null | undefined): FinishReason {
    switch (reason) {
        case 'stop':
            return 'stop';
        case 'length':
            return 'length';
        case 'tool_calls':
        case 'function_call':
            return 'tool-calls';
        default:
            return 'other';
    }
}

export function mapChatUsage(usage: NonNullable<ChatCompletionChunk['usage']>): TokenUsage {
    return {
        inputTokens: usage.prompt_tokens,
        outputTokens: usage.completion_tokens,
        cachedInputTokens: usage.prompt_tokens_details?.cached_tokens ?? 0,
    };
}

/**
 * Normalize a chat-completions chunk stream into stream parts.
 *
 * Tool calls are keyed by their wire `index`. The wire has no per-call end, so open
 * calls end in index order when `finish_reason` arrives or when the stream ends.
 * A transport failure yields one `stream-error` after everything produced so far.
 */
export async function* adaptChatCompletionStream(
    chunks: AsyncIterable<ChatCompletionChunk>,
    options: ChatStreamOptions = {}
): AsyncGenerator<StreamPart, void, undefined> {
    const provider = options.provider ?? 'openai-chat';
    const calls = new Map<number, WireToolCall>();
    let finishReason: FinishReason | undefined;
    let usage: TokenUsage | undefined;

    function* endOpenCalls(): Generator<StreamPart> {
        const indexes = [...calls.keys()].sort((a, b) => a - b);
        for (const index of indexes) {
            const call = calls.get(index);
            if (call?.started && !call.ended && call.id !== undefined) {
                call.ended = true;
                yield { type: 'tool-call-end', toolCallId: call.id };
            }
        }
    }

    try {
        for await (const chunk of chunks) {
            if (chunk.usage) {
                usage = mapChatUsage(chunk.usage);
            }

            for (const choice of chunk.choices) {
                const delta = choice.delta;

                const reasoning = readReasoning(delta);
                if (reasoning) {
                    yield {
                        type: 'thinking-delta',
                        delta: reasoning.text,
                        signature: reasoning.field,
                    };
                }

                if (typeof delta.content === 'string' && delta.content !== '') {
                    yield { type: 'text-delta', delta: delta.content };
                }

                for (const fragment of delta.tool_calls ?? []) {
                    let call = calls.get(fragment.index);
                    if (!call) {
                        call = {
                            id: undefined,
                            name: undefined,
                            pendingArguments: '',
                            started: false,
                            ended: false,
                        };
                        calls.set(fragment.index, call);
                    }

                    if (!call.started) {
                        if (fragment.id) call.id = fragment.id;
                        if (fragment.function?.name) call.name = fragment.function.name;
                    }

                    const argumentsDelta = fragment.function?.arguments ?? '';

                    if (!call.started && call.name !== undefined) {
                        call.id ??= `call_${nanoid()}`;
                        call.started = true;
                        yield { type: 'tool-call-start', toolCallId: call.id, toolName: call.name };
                        if (call.pendingArguments !== '') {
                            yield {
                                type: 'tool-call-delta',
                                toolCallId: call.id,
                                delta: call.pendingArguments,
                            };
                            call.pendingArguments = '';
                        }
                    }

                    if (argumentsDelta === '') continue;

                    if (call.started && call.id !== undefined) {
                        yield { type: 'tool-call-delta', toolCallId: call.id, delta: argumentsDelta };
                    } else {
                        call.pendingArguments += argumentsDelta;
                    }
                }

                if (choice.finish_reason) {
                    finishReason = mapChatFinishReason(choice.finish_reason);
                    yield* endOpenCalls();
                }
            }
        }
    } catch (error) {
        yield { type: 'stream-error', error: toTransportError(provider, error) };
        return;
    }

    const nameless = [...calls.values()].find((call) => !call.started);
    if (nameless) {
        yield {
            type: 'stream-error',
            error: LLMError.malformedStream('tool call fragment arrived without a name'),
        };
        return;
    }

    yield* endOpenCalls();
    yield { type: 'stream-done', finishReason: finishReason ?? 'other', usage };
}
