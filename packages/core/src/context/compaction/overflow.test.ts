import { describe, it, expect } from 'vitest';
import { decideCompaction, getBudget, isOverflow } from './overflow.js';

describe('getBudget', () => {
    it('should subtract the buffer from the context window', () => {
        expect(getBudget(200_000, 20_000)).toBe(180_000);
    });

    it('should not go below zero', () => {
        expect(getBudget(10, 20)).toBe(0);
    });
});

describe('decideCompaction', () => {
    it('should take no action at the budget', () => {
        expect(isOverflow(80, 80)).toBe(false);
        expect(decideCompaction(80, 80, 'continue')).toEqual({
            kind: 'no-action',
            estimate: 80,
            budget: 80,
        });
    });

    it('should carry the overflow policy once over budget', () => {
        expect(decideCompaction(81, 80, 'stop')).toEqual({
            kind: 'compact',
            strategy: 'stop',
            estimate: 81,
            budget: 80,
            targetTokens: 80,
        });
    });
});
