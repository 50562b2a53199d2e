import { describe, it, expect } from 'vitest';
import { OpenAIResponsesMessageFormatter } from './openai-responses.js';

describe('OpenAIResponsesMessageFormatter', () => {
    const formatter = new OpenAIResponsesMessageFormatter();

    it('should split assistant text and tool calls into separate items', () => {
        expect(
            formatter.format([
                {
                    id: 'm1',
                    timestamp: 0,
                    role: 'assistant',
                    content: [{ type: 'text', text: 'Looking' }],
                    toolCalls: [{ id: 'call_1', name: 'read_file', arguments: '{}' }],
                },
                {
                    id: 'm2',
                    timestamp: 0,
                    role: 'tool',
                    toolCallId: 'call_1',
                    toolName: 'read_file',
                    content: 'contents',
                    isError: false,
                },
            ])
        ).toEqual([
            { role: 'assistant', content: 'Looking' },
            { type: 'function_call', call_id: 'call_1', name: 'read_file', arguments: '{}' },
            { type: 'function_call_output', call_id: 'call_1', output: 'contents' },
        ]);
    });

    it('should describe tools as non-strict functions', () => {
        expect(
            formatter.formatTools([
                { name: 'noop', description: 'Nothing', parameters: { type: 'object' } },
            ])
        ).toEqual([
            {
                type: 'function',
                name: 'noop',
                description: 'Nothing',
                parameters: { type: 'object' },
                strict: false,
            },
        ]);
    });
});
