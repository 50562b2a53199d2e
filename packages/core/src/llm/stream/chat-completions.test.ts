import { describe, test, expect } from 'vitest';
import type { ChatCompletionChunk } from 'openai/resources';
import { adaptChatCompletionStream, mapChatFinishReason } from './chat-completions.js';
import type { StreamPart } from '../types.js';
import { LLMErrorCode } from '../error-codes.js';

type Delta = ChatCompletionChunk.Choice.Delta;

function chunk(
    delta: Delta,
    finishReason: ChatCompletionChunk.Choice['finish_reason'] = null
): ChatCompletionChunk {
    return {
        id: 'chunk-1',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'test-model',
        choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
}

function usageChunk(usage: NonNullable<ChatCompletionChunk['usage']>): ChatCompletionChunk {
    return {
        id: 'chunk-usage',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'test-model',
        choices: [],
        usage,
    };
}

/** Reasoning fields are not part of the SDK's delta type */
function reasoningDelta(field: 'reasoning_content' | 'reasoning', text: string): Delta {
    const delta =
        field === 'reasoning'
            ? { role: 'assistant' as const, reasoning: text }
            : { role: 'assistant' as const, reasoning_content: text };
    return delta;
}

async function* fromChunks(chunks: ChatCompletionChunk[], failWith?: Error) {
    for (const item of chunks) {
        yield item;
    }
    if (failWith) {
        throw failWith;
    }
}

async function collect(stream: AsyncIterable<StreamPart>): Promise<StreamPart[]> {
    const parts: StreamPart[] = [];
    for await (const part of stream) {
        parts.push(part);
    }
    return parts;
}

describe('adaptChatCompletionStream', () => {
    test('should map reasoning, text, finish reason and usage', async () => {
        const parts = await collect(
            adaptChatCompletionStream(
                fromChunks([
                    chunk(reasoningDelta('reasoning_content', 'hmm')),
                    chunk({ content: 'Hello' }),
                    chunk({ content: ' world' }, 'stop'),
                    usageChunk({
                        prompt_tokens: 12,
                        completion_tokens: 3,
                        total_tokens: 15,
                        prompt_tokens_details: { cached_tokens: 4 },
                    }),
                ])
            )
        );

        expect(parts).toEqual([
            { type: 'thinking-delta', delta: 'hmm', signature: 'reasoning_content' },
            { type: 'text-delta', delta: 'Hello' },
            { type: 'text-delta', delta: ' world' },
            {
                type: 'stream-done',
                finishReason: 'stop',
                usage: { inputTokens: 12, outputTokens: 3, cachedInputTokens: 4 },
            },
        ]);
    });

    test('should read reasoning from the alternative field names', async () => {
        const parts = await collect(
            adaptChatCompletionStream(fromChunks([chunk(reasoningDelta('reasoning', 'step'), 'stop')]))
        );

        expect(parts[0]).toEqual({ type: 'thinking-delta', delta: 'step', signature: 'reasoning' });
    });

    test('should key tool-call fragments by index and end them at finish_reason', async () => {
        const parts = await collect(
            adaptChatCompletionStream(
                fromChunks([
                    chunk({
                        tool_calls: [
                            { index: 0, id: 'call_a', function: { name: 'read_file', arguments: '' } },
                        ],
                    }),
                    chunk({
                        tool_calls: [
                            {
                                index: 1,
                                id: 'call_b',
                                function: { name: 'grep_content', arguments: '{"pat' },
                            },
                        ],
                    }),
                    chunk({ tool_calls: [{ index: 0, function: { arguments: '{"file_path":"a"}' } }] }),
                    chunk({ tool_calls: [{ index: 1, function: { arguments: 'tern":"x"}' } }] }),
                    chunk({}, 'tool_calls'),
                ])
            )
        );

        expect(parts).toEqual([
            { type: 'tool-call-start', toolCallId: 'call_a', toolName: 'read_file' },
            { type: 'tool-call-start', toolCallId: 'call_b', toolName: 'grep_content' },
            { type: 'tool-call-delta', toolCallId: 'call_b', delta: '{"pat' },
            { type: 'tool-call-delta', toolCallId: 'call_a', delta: '{"file_path":"a"}' },
            { type: 'tool-call-delta', toolCallId: 'call_b', delta: 'tern":"x"}' },
            { type: 'tool-call-end', toolCallId: 'call_a' },
            { type: 'tool-call-end', toolCallId: 'call_b' },
            { type: 'stream-done', finishReason: 'tool-calls', usage: undefined },
        ]);
    });

    test('should hold arguments that arrive before the name', async () => {
        const parts = await collect(
            adaptChatCompletionStream(
                fromChunks([
                    chunk({ tool_calls: [{ index: 0, id: 'call_x', function: { arguments: '{"a":1}' } }] }),
                    chunk({ tool_calls: [{ index: 0, function: { name: 'read_file' } }] }),
                ])
            )
        );

        expect(parts).toEqual([
            { type: 'tool-call-start', toolCallId: 'call_x', toolName: 'read_file' },
            { type: 'tool-call-delta', toolCallId: 'call_x', delta: '{"a":1}' },
            { type: 'tool-call-end', toolCallId: 'call_x' },
            { type: 'stream-done', finishReason: 'other', usage: undefined },
        ]);
    });

    test('should generate an id when the wire omits it', async () => {
        const parts = await collect(
            adaptChatCompletionStream(
                fromChunks([chunk({ tool_calls: [{ index: 0, function: { name: 'glob_files' } }] }, 'tool_calls')])
            )
        );

        const start = parts[0];
        expect(start?.type).toBe('tool-call-start');
        if (start?.type === 'tool-call-start') {
            expect(start.toolCallId).toMatch(/^call_/);
            expect(parts[1]).toEqual({ type: 'tool-call-end', toolCallId: start.toolCallId });
        }
    });

    test('should report a fragment that never received a name', async () => {
        const parts = await collect(
            adaptChatCompletionStream(
                fromChunks([chunk({ tool_calls: [{ index: 0, function: { arguments: '{}' } }] })])
            )
        );

        expect(parts).toHaveLength(1);
        const [part] = parts;
        expect(part?.type).toBe('stream-error');
        if (part?.type === 'stream-error') {
            expect(part.error.code).toBe(LLMErrorCode.MALFORMED_STREAM);
            expect(part.error.message).toBe(
                'Malformed provider stream: tool call fragment arrived without a name'
            );
        }
    });

    test('should yield partial output then one stream-error when the transport fails', async () => {
        const failure = Object.assign(new Error('socket hang up'), { status: 502 });
        const parts = await collect(
            adaptChatCompletionStream(fromChunks([chunk({ content: 'par' })], failure), {
                provider: 'local',
            })
        );

        expect(parts).toHaveLength(2);
        expect(parts[0]).toEqual({ type: 'text-delta', delta: 'par' });
        const last = parts[1];
        expect(last?.type).toBe('stream-error');
        if (last?.type === 'stream-error') {
            expect(last.error.code).toBe(LLMErrorCode.TRANSPORT_FAILED);
            expect(last.error.message).toBe("Provider 'local' transport failed: socket hang up");
            expect(last.error.context).toEqual({
                provider: 'local',
                reason: 'socket hang up',
                status: 502,
            });
        }
    });
});

describe('mapChatFinishReason', () => {
    test('should map wire finish reasons', () => {
        expect(mapChatFinishReason('stop')).toBe('stop');
        expect(mapChatFinishReason('length')).toBe('length');
        expect(mapChatFinishReason('tool_calls')).toBe('tool-calls');
        expect(mapChatFinishReason('function_call')).toBe('tool-calls');
        expect(mapChatFinishReason('content_filter')).toBe('other');
        expect(mapChatFinishReason(null)).toBe('other');
    });
});
