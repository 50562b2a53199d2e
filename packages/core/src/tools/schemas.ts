import { z } from 'zod';

export const DEFAULT_TOOL_MAX_CONCURRENCY = 8;
export const DEFAULT_TOOL_IDLE_TIMEOUT_MS = 120_000;
export const DEFAULT_TOOL_CANCEL_GRACE_MS = 2_000;

export const ToolDispatchConfigSchema = z
    .object({
        maxConcurrency: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_TOOL_MAX_CONCURRENCY)
            .describe('Upper bound on tool executions running at once; 1 runs calls in order'),
        idleTimeoutMs: z
            .number()
            .int()
            .default(DEFAULT_TOOL_IDLE_TIMEOUT_MS)
            .describe(
                'A call that reports no progress for this long is aborted and fails with a timeout; <= 0 disables'
            ),
        cancelGraceMs: z
            .number()
            .int()
            .nonnegative()
            .default(DEFAULT_TOOL_CANCEL_GRACE_MS)
            .describe('How long cancelled calls may take to stop before they are marked timed out'),
    })
    .strict()
    .default({})
    .describe('Tool execution settings');

export type ToolDispatchConfig = z.input<typeof ToolDispatchConfigSchema>;
export type ValidatedToolDispatchConfig = z.output<typeof ToolDispatchConfigSchema>;
