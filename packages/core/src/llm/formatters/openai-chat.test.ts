import { describe, it, expect } from 'vitest';
import { OpenAIChatMessageFormatter } from './openai-chat.js';
import type { ConversationMessage } from '../../context/types.js';

describe('OpenAIChatMessageFormatter', () => {
    const formatter = new OpenAIChatMessageFormatter();

    it('should put the system prompt before the history', () => {
        const history: ConversationMessage[] = [
            { id: 'm1', timestamp: 0, role: 'system', content: 'Seeded prompt' },
            { id: 'm2', timestamp: 0, role: 'user', content: 'hi' },
        ];

        expect(formatter.format(history, 'Extra prompt')).toEqual([
            { role: 'system', content: 'Extra prompt' },
            { role: 'system', content: 'Seeded prompt' },
            { role: 'user', content: 'hi' },
        ]);
    });

    it('should send reasoning back in the field it arrived in', () => {
        const history: ConversationMessage[] = [
            {
                id: 'm1',
                timestamp: 0,
                role: 'assistant',
                content: [
                    { type: 'thinking', text: 'step one', signature: 'reasoning_content' },
                    { type: 'thinking', text: 'unknown field', signature: 'opaque' },
                ],
                toolCalls: [{ id: 'call_1', name: 'glob_files', arguments: '{"pattern":"*.ts"}' }],
            },
            {
                id: 'm2',
                timestamp: 0,
                role: 'tool',
                toolCallId: 'call_1',
                toolName: 'glob_files',
                content: '',
                isError: false,
            },
        ];

        expect(formatter.format(history)).toEqual([
            {
                role: 'assistant',
                content: null,
                reasoning_content: 'step one',
                tool_calls: [
                    {
                        id: 'call_1',
                        type: 'function',
                        function: { name: 'glob_files', arguments: '{"pattern":"*.ts"}' },
                    },
                ],
            },
            { role: 'tool', tool_call_id: 'call_1', content: '(no output)' },
        ]);
    });

    it('should join assistant text blocks', () => {
        const history: ConversationMessage[] = [
            {
                id: 'm1',
                timestamp: 0,
                role: 'assistant',
                content: [
                    { type: 'text', text: 'Hello ' },
                    { type: 'text', text: 'there' },
                ],
                toolCalls: [],
            },
        ];

        expect(formatter.format(history)).toEqual([{ role: 'assistant', content: 'Hello there' }]);
    });
});
