import { describe, it, expect } from 'vitest';
import { findCompactableRange, isSummary } from './split.js';
import type { MessageDraft } from '../types.js';

const system: MessageDraft = { role: 'system', content: 'sys' };
const user = (content: string): MessageDraft => ({ role: 'user', content });
const assistant = (text: string): MessageDraft => ({
    role: 'assistant',
    content: [{ type: 'text', text }],
    toolCalls: [],
});
const calling = (...ids: string[]): MessageDraft => ({
    role: 'assistant',
    content: [],
    toolCalls: ids.map((id) => ({ id, name: 'echo', arguments: '{}' })),
});
const result = (id: string): MessageDraft => ({
    role: 'tool',
    toolCallId: id,
    toolName: 'echo',
    content: 'ok',
    isError: false,
});
const summary: MessageDraft = {
    role: 'assistant',
    content: [{ type: 'text', text: 'summary' }],
    toolCalls: [],
    metadata: { isSummary: true, summarizedMessages: 4 },
};

describe('findCompactableRange', () => {
    const history = [
        system,
        user('u1'),
        assistant('a1'),
        user('u2'),
        assistant('a2'),
        user('u3'),
        assistant('a3'),
    ];

    it('should stop right before the assistant message of the preserved turns', () => {
        expect(findCompactableRange(history, 2)).toEqual({ start: 1, end: 4 });
        expect(findCompactableRange(history, 1)).toEqual({ start: 1, end: 6 });
    });

    it('should cover everything after the system message when nothing is preserved', () => {
        expect(findCompactableRange(history, 0)).toEqual({ start: 1, end: 7 });
    });

    it('should start at zero without a system message', () => {
        expect(findCompactableRange(history.slice(1), 1)).toEqual({ start: 0, end: 5 });
    });

    it('should count tool rounds within a single prompt as turns', () => {
        const rounds = [
            system,
            user('long task'),
            calling('c1'),
            result('c1'),
            calling('c2'),
            result('c2'),
            calling('c3'),
            result('c3'),
        ];

        expect(findCompactableRange(rounds, 2)).toEqual({ start: 1, end: 4 });
        expect(findCompactableRange(rounds, 1)).toEqual({ start: 1, end: 6 });
    });

    it('should keep every result of a parallel round with its tool calls', () => {
        const rounds = [
            system,
            user('task'),
            calling('c1', 'c2'),
            result('c1'),
            result('c2'),
            calling('c3'),
            result('c3'),
        ];

        expect(findCompactableRange(rounds, 1)).toEqual({ start: 1, end: 5 });
    });

    it('should return null with fewer turns than preserved', () => {
        expect(findCompactableRange([system, user('u1'), assistant('a1')], 2)).toBeNull();
    });

    it('should leave only the prompt compactable when a single round is preserved', () => {
        const rounds = [system, user('u1'), calling('c1'), result('c1')];

        expect(findCompactableRange(rounds, 1)).toEqual({ start: 1, end: 2 });
    });

    it('should not count a summary as a turn', () => {
        expect(findCompactableRange([system, summary, user('u1'), assistant('a1')], 2)).toBeNull();
    });

    it('should not compact a lone summary', () => {
        expect(findCompactableRange([system, summary, assistant('a1')], 1)).toBeNull();
    });

    it('should include a summary followed by more history', () => {
        expect(
            findCompactableRange([system, summary, user('u1'), assistant('a1'), user('u2')], 1)
        ).toEqual({ start: 1, end: 3 });
    });
});

describe('isSummary', () => {
    it('should only match flagged assistant messages', () => {
        expect(isSummary(summary)).toBe(true);
        expect(isSummary(assistant('plain'))).toBe(false);
        expect(isSummary(undefined)).toBe(false);
    });
});
