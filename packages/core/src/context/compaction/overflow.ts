import type { OverflowPolicy } from './schemas.js';

/**
 * Result of comparing the current estimate against the budget
 */
export type CompactionDecision =
    | { kind: 'no-action'; estimate: number; budget: number }
    | {
          kind: 'compact';
          strategy: OverflowPolicy;
          estimate: number;
          budget: number;
          /** Token count the compacted history must fit under */
          targetTokens: number;
      };

/**
 * Usable tokens: the context window minus the headroom kept for the response.
 */
export function getBudget(contextWindow: number, bufferTokens: number): number {
    return Math.max(0, contextWindow - bufferTokens);
}

export function isOverflow(estimate: number, budget: number): boolean {
    return estimate > budget;
}

export function decideCompaction(
    estimate: number,
    budget: number,
    strategy: OverflowPolicy
): CompactionDecision {
    if (!isOverflow(estimate, budget)) {
        return { kind: 'no-action', estimate, budget };
    }
    return { kind: 'compact', strategy, estimate, budget, targetTokens: budget };
}
