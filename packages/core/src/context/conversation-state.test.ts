import { describe, it, expect } from 'vitest';
import { ConversationState } from './conversation-state.js';
import { ContextErrorCode } from './error-codes.js';
import type { MessageDraft } from './types.js';

const user = (content: string): MessageDraft => ({ role: 'user', content });
const assistant = (text: string): MessageDraft => ({
    role: 'assistant',
    content: [{ type: 'text', text }],
    toolCalls: [],
});

describe('ConversationState', () => {
    it('should assign an id and timestamp on append', () => {
        const state = new ConversationState();

        const message = state.append(user('hello'));

        expect(message.id).toEqual(expect.any(String));
        expect(message.timestamp).toEqual(expect.any(Number));
        expect(Object.isFrozen(message)).toBe(true);
        expect(state.length).toBe(1);
    });

    it('should keep append order across appendAll', () => {
        const state = new ConversationState([{ role: 'system', content: 'sys' }]);

        state.append(user('one'));
        state.appendAll([assistant('two'), user('three')]);

        expect(state.messages().map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
        expect(state.lastUserContent()).toBe('three');
    });

    it('should return a copy of the history', () => {
        const state = new ConversationState([user('one')]);

        const snapshot = state.messages();
        state.append(user('two'));

        expect(snapshot).toHaveLength(1);
    });

    it('should replace a range in one splice', () => {
        const state = new ConversationState([
            { role: 'system', content: 'sys' },
            user('a'),
            assistant('b'),
            user('c'),
        ]);

        state.replaceRange(1, 3, [assistant('summary')]);

        const messages = state.messages();
        expect(messages).toHaveLength(3);
        expect(messages[1]?.role === 'assistant' && messages[1].content).toEqual([
            { type: 'text', text: 'summary' },
        ]);
        expect(messages[2]?.role === 'user' && messages[2].content).toBe('c');
    });

    it('should reject ranges outside the history', () => {
        const state = new ConversationState([user('a'), user('b')]);

        expect(() => state.replaceRange(3, 2, [])).toThrow(
            'Invalid message range [3, 2) for conversation of 2 messages'
        );
        expect(() => state.replaceRange(0, 3, [])).toThrow(
            expect.objectContaining({ code: ContextErrorCode.INVALID_RANGE })
        );
    });

    it('should protect the leading system message', () => {
        const state = new ConversationState([{ role: 'system', content: 'sys' }, user('a')]);

        expect(() => state.replaceRange(0, 1, [])).toThrow(
            'The leading system message cannot be replaced'
        );
        expect(state.length).toBe(2);
    });

    it('should restore a checkpoint', () => {
        const state = new ConversationState([user('a')]);
        const checkpoint = state.checkpoint();
        const before = state.messages();

        state.appendAll([assistant('b'), user('c')]);
        state.restore(checkpoint);

        expect(checkpoint.length).toBe(1);
        expect(state.messages()).toEqual(before);
    });

    it('should report no user content for an empty history', () => {
        expect(new ConversationState().lastUserContent()).toBeUndefined();
    });
});
