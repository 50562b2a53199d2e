import type { MessageDraft, TokenEstimator } from './types.js';

/** Flat per-message overhead for role markers and framing */
const MESSAGE_OVERHEAD_TOKENS = 4;

/** Average characters per token */
const CHARS_PER_TOKEN = 4;

export function estimateTextTokens(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Character-ratio estimator: ceil(chars / 4) for every text payload plus a flat
 * overhead per message. Cheap and provider-agnostic.
 */
export class CharRatioTokenEstimator implements TokenEstimator {
    estimate(messages: readonly MessageDraft[]): number {
        let total = 0;
        for (const message of messages) {
            total += MESSAGE_OVERHEAD_TOKENS + this.estimateMessage(message);
        }
        return total;
    }

    private estimateMessage(message: MessageDraft): number {
        switch (message.role) {
            case 'system':
            case 'user':
                return estimateTextTokens(message.content);
            case 'tool':
                return estimateTextTokens(message.content);
            case 'assistant': {
                let tokens = 0;
                for (const block of message.content) {
                    tokens += estimateTextTokens(block.text);
                }
                for (const call of message.toolCalls) {
                    tokens += estimateTextTokens(call.name) + estimateTextTokens(call.arguments);
                }
                return tokens;
            }
        }
    }
}
