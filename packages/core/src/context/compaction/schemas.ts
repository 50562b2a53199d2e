import { z } from 'zod';

export const OVERFLOW_POLICIES = ['continue', 'stop'] as const;
export type OverflowPolicy = (typeof OVERFLOW_POLICIES)[number];

/**
 * Compaction configuration schema
 */
export const CompactionConfigSchema = z
    .object({
        onOverflow: z
            .enum(OVERFLOW_POLICIES)
            .default('continue')
            .describe(
                "'continue' summarizes old history to fit the budget; 'stop' halts the cycle before calling the provider"
            ),
        bufferTokens: z
            .number()
            .int()
            .nonnegative()
            .default(20_000)
            .describe('Headroom subtracted from the context window to form the budget'),
        preserveLastNTurns: z
            .number()
            .int()
            .nonnegative()
            .default(2)
            .describe('Number of recent turns (user message onwards) never compacted'),
        maxSummaryTokens: z
            .number()
            .int()
            .positive()
            .default(2000)
            .describe('Output cap for the summary call'),
    })
    .strict()
    .describe('Context compaction configuration');

export type CompactionConfig = z.output<typeof CompactionConfigSchema>;
export type CompactionConfigInput = z.input<typeof CompactionConfigSchema>;
