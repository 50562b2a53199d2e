import { describe, it, expect } from 'vitest';
import { CharRatioTokenEstimator, estimateTextTokens } from './token-estimator.js';

describe('estimateTextTokens', () => {
    it('should round up to whole tokens', () => {
        expect(estimateTextTokens('')).toBe(0);
        expect(estimateTextTokens('abcd')).toBe(1);
        expect(estimateTextTokens('abcde')).toBe(2);
    });
});

describe('CharRatioTokenEstimator', () => {
    const estimator = new CharRatioTokenEstimator();

    it('should add a per-message overhead', () => {
        expect(estimator.estimate([{ role: 'user', content: 'abcdefgh' }])).toBe(6);
        expect(estimator.estimate([])).toBe(0);
    });

    it('should count assistant text, thinking and tool calls', () => {
        const estimate = estimator.estimate([
            {
                role: 'assistant',
                content: [
                    { type: 'thinking', text: 'abcd' },
                    { type: 'text', text: 'abc' },
                ],
                toolCalls: [{ id: 'call_1', name: 'read', arguments: '{}' }],
            },
        ]);

        // 4 overhead + 1 thinking + 1 text + 1 name + 1 arguments
        expect(estimate).toBe(8);
    });

    it('should count tool results', () => {
        expect(
            estimator.estimate([
                {
                    role: 'tool',
                    toolCallId: 'call_1',
                    toolName: 'read',
                    content: 'x'.repeat(40),
                    isError: false,
                },
            ])
        ).toBe(14);
    });
});
