import { describe, test, expect, vi } from 'vitest';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources';
import { OpenAIChatProvider, type ChatCompletionsClient } from './openai-chat.js';
import { MockHTTPError } from './mock.js';
import type { StreamPart } from '../types.js';
import { createMockLogger } from '../../logger/test-utils.js';

function textChunk(content: string, finishReason: 'stop' | null = null): ChatCompletionChunk {
    return {
        id: 'chunk',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'gpt-test',
        choices: [{ index: 0, delta: { content }, finish_reason: finishReason }],
    };
}

async function* chunks(items: ChatCompletionChunk[]) {
    for (const item of items) {
        yield item;
    }
}

async function collect(stream: AsyncIterable<StreamPart>): Promise<StreamPart[]> {
    const parts: StreamPart[] = [];
    for await (const part of stream) {
        parts.push(part);
    }
    return parts;
}

describe('OpenAIChatProvider', () => {
    const logger = createMockLogger();

    test('should send a streaming request and adapt the chunks', async () => {
        const create = vi.fn<ChatCompletionsClient['create']>(async () =>
            chunks([textChunk('Hi'), textChunk('!', 'stop')])
        );
        const provider = new OpenAIChatProvider(
            { model: 'gpt-test', maxOutputTokens: 256, retryDelaysMs: [] },
            logger,
            { create }
        );

        const parts = await collect(
            provider.stream(
                {
                    messages: [{ id: 'm1', timestamp: 0, role: 'user', content: 'hello' }],
                    tools: [
                        {
                            name: 'read_file',
                            description: 'Read a file',
                            parameters: { type: 'object', properties: {} },
                        },
                    ],
                    systemPrompt: 'Be brief.',
                },
                new AbortController().signal
            )
        );

        expect(parts).toEqual([
            { type: 'text-delta', delta: 'Hi' },
            { type: 'text-delta', delta: '!' },
            { type: 'stream-done', finishReason: 'stop', usage: undefined },
        ]);

        const params: ChatCompletionCreateParamsStreaming | undefined = create.mock.calls[0]?.[0];
        expect(params).toEqual({
            model: 'gpt-test',
            messages: [
                { role: 'system', content: 'Be brief.' },
                { role: 'user', content: 'hello' },
            ],
            stream: true,
            stream_options: { include_usage: true },
            tools: [
                {
                    type: 'function',
                    function: {
                        name: 'read_file',
                        description: 'Read a file',
                        parameters: { type: 'object', properties: {} },
                    },
                },
            ],
            max_completion_tokens: 256,
        });
    });

    test('should yield one stream error when opening fails', async () => {
        const create = vi.fn<ChatCompletionsClient['create']>(async () => {
            throw new MockHTTPError('Unauthorized', 401);
        });
        const provider = new OpenAIChatProvider(
            { model: 'gpt-test', retryDelaysMs: [0] },
            logger,
            { create }
        );

        const parts = await collect(
            provider.stream({ messages: [], tools: [] }, new AbortController().signal)
        );

        expect(create).toHaveBeenCalledTimes(1);
        expect(parts).toHaveLength(1);
        const [part] = parts;
        expect(part?.type === 'stream-error' && part.error.message).toBe(
            "Provider 'openai-chat' transport failed: Unauthorized"
        );
    });
});
