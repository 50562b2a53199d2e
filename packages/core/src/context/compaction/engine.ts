import type { AgentEventBus } from '../../events/index.js';
import type { Logger } from '../../logger/types.js';
import { LogComponent } from '../../logger/types.js';
import type { ConversationState } from '../conversation-state.js';
import type { MessageDraft, TokenEstimator } from '../types.js';
import { ContextError } from '../errors.js';
import type { CompactionConfig } from './schemas.js';
import type { CompactionOutcome, Summarizer } from './types.js';
import { decideCompaction, getBudget, type CompactionDecision } from './overflow.js';
import { findCompactableRange, isSummary } from './split.js';

export interface CompactionEngineOptions {
    contextWindow: number;
    config: CompactionConfig;
    estimator: TokenEstimator;
    summarizer: Summarizer;
    logger: Logger;
    eventBus?: AgentEventBus | undefined;
}

/**
 * Keeps the conversation within `contextWindow - bufferTokens`.
 *
 * Under policy `continue` the oldest compactable run is replaced by a summary,
 * re-estimated, and repeated on a working copy until the history fits. The result
 * is committed with a single `replaceRange`, so a failed or cancelled pass leaves
 * the conversation untouched. Under policy `stop` the caller is told to halt.
 */
export class CompactionEngine {
    private readonly logger: Logger;
    readonly budget: number;

    constructor(private readonly options: CompactionEngineOptions) {
        this.logger = options.logger.createChild(LogComponent.CONTEXT);
        this.budget = getBudget(options.contextWindow, options.config.bufferTokens);
    }

    decide(messages: readonly MessageDraft[]): CompactionDecision {
        const estimate = this.options.estimator.estimate(messages);
        return decideCompaction(estimate, this.budget, this.options.config.onOverflow);
    }

    /**
     * @throws StepwiseRuntimeError `context_overflow_unrecoverable` when nothing is left to compact
     */
    async run(state: ConversationState, signal: AbortSignal): Promise<CompactionOutcome> {
        const decision = this.decide(state.messages());

        if (decision.kind === 'no-action') {
            return decision;
        }

        if (decision.strategy === 'stop') {
            this.logger.warn(
                `Context overflow: ${decision.estimate} tokens exceeds budget ${decision.budget}, halting`
            );
            return {
                kind: 'halted',
                error: ContextError.overflowHalted(decision.estimate, decision.budget),
            };
        }

        return this.compact(state, decision.estimate, signal);
    }

    private async compact(
        state: ConversationState,
        tokensBefore: number,
        signal: AbortSignal
    ): Promise<CompactionOutcome> {
        const { estimator, summarizer, config, eventBus } = this.options;
        const budget = this.budget;

        eventBus?.emit({ type: 'context:compaction-start', tokensBefore, budget });
        this.logger.info(`Compacting context: ${tokensBefore} tokens, budget ${budget}`);

        const original = state.messages();
        const currentTask = state.lastUserContent();
        let working: readonly MessageDraft[] = original;
        let estimate = tokensBefore;
        let rangeStart = -1;
        let consumed = 0;
        let rounds = 0;
        let summary: MessageDraft | undefined;

        const finish = (tokensAfter: number, aborted: boolean) => {
            eventBus?.emit({
                type: 'context:compaction-end',
                tokensBefore,
                tokensAfter,
                summarizedMessages: aborted ? 0 : consumed,
                aborted,
            });
        };

        while (estimate > budget) {
            const range = findCompactableRange(working, config.preserveLastNTurns);
            if (!range) {
                finish(tokensBefore, true);
                this.logger.error(
                    `Context overflow unrecoverable: ${estimate} tokens, budget ${budget}`
                );
                throw ContextError.overflowUnrecoverable(estimate, budget);
            }

            const run = working.slice(range.start, range.end);
            let text: string;
            try {
                text = await summarizer.summarize(run, { signal, currentTask });
            } catch (error) {
                finish(tokensBefore, true);
                throw error;
            }
            if (signal.aborted) {
                finish(tokensBefore, true);
                return { kind: 'aborted' };
            }

            // Later rounds fold the previous summary into the new one
            rangeStart = range.start;
            consumed += isSummary(run[0]) ? run.length - 1 : run.length;
            rounds++;
            summary = {
                role: 'assistant',
                content: [{ type: 'text', text }],
                toolCalls: [],
                metadata: { isSummary: true, summarizedMessages: consumed },
            };
            working = [...working.slice(0, range.start), summary, ...working.slice(range.end)];
            estimate = estimator.estimate(working);

            this.logger.debug(
                `Compaction round ${rounds}: ${run.length} messages summarized, ${estimate} tokens`
            );
        }

        if (summary) {
            const span = this.originalSpan(original, rangeStart, consumed);
            state.replaceRange(rangeStart, rangeStart + span, [summary]);
        }

        finish(estimate, false);
        this.logger.info(
            `Compacted ${consumed} messages in ${rounds} round(s): ${tokensBefore} -> ${estimate} tokens`
        );

        return {
            kind: 'compacted',
            tokensBefore,
            tokensAfter: estimate,
            budget,
            summarizedMessages: consumed,
            rounds,
        };
    }

    /**
     * Number of messages in the committed history covered by the summary.
     * An existing summary at the start of the range is replaced as well.
     */
    private originalSpan(
        original: readonly MessageDraft[],
        start: number,
        consumed: number
    ): number {
        return isSummary(original[start]) ? consumed + 1 : consumed;
    }
}
