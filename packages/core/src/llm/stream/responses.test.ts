import { describe, test, expect } from 'vitest';
import { adaptResponsesStream } from './responses.js';
import type { StreamPart } from '../types.js';
import { LLMErrorCode } from '../error-codes.js';

async function* fromEvents(events: unknown[]) {
    for (const event of events) {
        yield event;
    }
}

async function collect(events: unknown[]): Promise<StreamPart[]> {
    const parts: StreamPart[] = [];
    for await (const part of adaptResponsesStream(fromEvents(events))) {
        parts.push(part);
    }
    return parts;
}

function errorOf(part: StreamPart | undefined) {
    if (part?.type !== 'stream-error') {
        throw new Error(`expected stream-error, got ${part?.type ?? 'nothing'}`);
    }
    return part.error;
}

describe('adaptResponsesStream', () => {
    test('should map text and reasoning deltas and finish with usage', async () => {
        const parts = await collect([
            { type: 'response.created', response: { id: 'resp_1' } },
            {
                type: 'response.reasoning_summary_text.delta',
                item_id: 'rs_1',
                output_index: 0,
                summary_index: 0,
                delta: 'why',
            },
            { type: 'response.output_text.delta', item_id: 'msg_1', output_index: 1, delta: 'Hi' },
            {
                type: 'response.completed',
                response: {
                    usage: {
                        input_tokens: 5,
                        output_tokens: 2,
                        input_tokens_details: { cached_tokens: 1 },
                    },
                },
            },
        ]);

        expect(parts).toEqual([
            { type: 'thinking-delta', delta: 'why', signature: 'reasoning_summary' },
            { type: 'text-delta', delta: 'Hi' },
            {
                type: 'stream-done',
                finishReason: 'stop',
                usage: { inputTokens: 5, outputTokens: 2, cachedInputTokens: 1 },
            },
        ]);
    });

    test('should bracket a function call between item added and item done', async () => {
        const parts = await collect([
            {
                type: 'response.output_item.added',
                output_index: 1,
                item: {
                    type: 'function_call',
                    id: 'fc_1',
                    call_id: 'call_1',
                    name: 'read_file',
                    arguments: '',
                },
            },
            {
                type: 'response.function_call_arguments.delta',
                item_id: 'fc_1',
                output_index: 1,
                delta: '{"file_path":',
            },
            {
                type: 'response.function_call_arguments.delta',
                item_id: 'fc_1',
                output_index: 1,
                delta: '"a"}',
            },
            {
                type: 'response.output_item.done',
                output_index: 1,
                item: { type: 'function_call', id: 'fc_1' },
            },
            { type: 'response.completed', response: {} },
        ]);

        expect(parts).toEqual([
            { type: 'tool-call-start', toolCallId: 'call_1', toolName: 'read_file' },
            { type: 'tool-call-delta', toolCallId: 'call_1', delta: '{"file_path":' },
            { type: 'tool-call-delta', toolCallId: 'call_1', delta: '"a"}' },
            { type: 'tool-call-end', toolCallId: 'call_1' },
            { type: 'stream-done', finishReason: 'tool-calls' },
        ]);
    });

    test('should leave a call that never reaches done open', async () => {
        const parts = await collect([
            {
                type: 'response.output_item.added',
                output_index: 0,
                item: { type: 'function_call', id: 'fc_1', call_id: 'call_1', name: 'bash_exec' },
            },
            { type: 'response.completed', response: {} },
        ]);

        expect(parts.map((part) => part.type)).toEqual(['tool-call-start', 'stream-done']);
    });

    test('should map an output cap to a length finish', async () => {
        const parts = await collect([
            { type: 'response.output_text.delta', delta: 'trunc' },
            {
                type: 'response.incomplete',
                response: { incomplete_details: { reason: 'max_output_tokens' } },
            },
        ]);

        expect(parts[1]).toEqual({ type: 'stream-done', finishReason: 'length' });
    });

    test('should turn a failed response into one stream error', async () => {
        const parts = await collect([
            { type: 'response.output_text.delta', delta: 'a' },
            { type: 'response.failed', response: { error: { code: 'server_error', message: 'overloaded' } } },
            { type: 'response.output_text.delta', delta: 'never' },
        ]);

        expect(parts).toHaveLength(2);
        const error = errorOf(parts[1]);
        expect(error.code).toBe(LLMErrorCode.TRANSPORT_FAILED);
        expect(error.message).toBe("Provider 'openai-responses' transport failed: overloaded");
    });

    test('should report a stream that ends before completion', async () => {
        const parts = await collect([{ type: 'response.output_text.delta', delta: 'a' }]);

        const error = errorOf(parts[1]);
        expect(error.code).toBe(LLMErrorCode.MALFORMED_STREAM);
        expect(error.message).toBe(
            'Malformed provider stream: stream ended before the response completed'
        );
    });

    test('should reject an event with an unexpected shape', async () => {
        const parts = await collect([{ type: 'response.output_text.delta' }]);

        expect(parts).toHaveLength(1);
        expect(errorOf(parts[0]).message).toBe(
            "Malformed provider stream: unexpected shape for 'response.output_text.delta' event"
        );
    });
});
