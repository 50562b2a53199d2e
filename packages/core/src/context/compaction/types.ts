import type { StepwiseRuntimeError } from '../../errors/runtime-error.js';
import type { MessageDraft } from '../types.js';

export interface SummarizeOptions {
    signal: AbortSignal;
    /** Most recent user request, kept verbatim in the summary */
    currentTask?: string | undefined;
}

/**
 * Produces the text of a summary message for a run of messages
 */
export interface Summarizer {
    summarize(messages: readonly MessageDraft[], options: SummarizeOptions): Promise<string>;
}

/**
 * Half-open index range of compactable messages
 */
export interface MessageRange {
    start: number;
    end: number;
}

export type CompactionOutcome =
    | { kind: 'no-action'; estimate: number; budget: number }
    | {
          kind: 'compacted';
          tokensBefore: number;
          tokensAfter: number;
          budget: number;
          /** Original messages replaced by the summary */
          summarizedMessages: number;
          /** Summarizer calls needed to get under budget */
          rounds: number;
      }
    | { kind: 'halted'; error: StepwiseRuntimeError }
    | { kind: 'aborted' };
