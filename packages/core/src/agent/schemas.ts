import { z } from 'zod';
import { CompactionConfigSchema } from '../context/compaction/schemas.js';
import { ToolDispatchConfigSchema } from '../tools/schemas.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { AgentErrorCode } from './error-codes.js';

export const DEFAULT_CONTEXT_WINDOW = 200_000;
export const DEFAULT_MAX_TURNS = 500;
export const DEFAULT_QUEUE_CAPACITY = 5;
export const DEFAULT_TOOL_CALL_IDLE_TIMEOUT_MS = 60_000;

export const StreamConfigSchema = z
    .object({
        toolCallIdleTimeoutMs: z
            .number()
            .int()
            .default(DEFAULT_TOOL_CALL_IDLE_TIMEOUT_MS)
            .describe(
                'While tool-call arguments are streaming, a gap this long between parts ends the turn with the calls collected so far; <= 0 disables'
            ),
    })
    .strict()
    .default({})
    .describe('Provider stream settings');

export const PromptQueueConfigSchema = z
    .object({
        capacity: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_QUEUE_CAPACITY)
            .describe('Prompts that may wait while a cycle runs; further submissions are rejected'),
    })
    .strict()
    .default({})
    .describe('Prompt queue settings');

/**
 * Agent loop configuration schema
 */
export const AgentLoopConfigSchema = z
    .object({
        contextWindow: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_CONTEXT_WINDOW)
            .describe('Token budget of the model'),
        maxTurns: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_TURNS)
            .describe('Upper bound on provider calls within one prompt cycle'),
        compaction: CompactionConfigSchema.default({}),
        tools: ToolDispatchConfigSchema,
        stream: StreamConfigSchema,
        queue: PromptQueueConfigSchema,
    })
    .strict()
    .superRefine((data, ctx) => {
        if (data.compaction.bufferTokens >= data.contextWindow) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['compaction', 'bufferTokens'],
                message: `bufferTokens (${data.compaction.bufferTokens}) must be smaller than contextWindow (${data.contextWindow})`,
                params: {
                    code: AgentErrorCode.INVALID_CONFIG,
                    scope: ErrorScope.AGENT,
                    type: ErrorType.USER,
                },
            });
        }
    })
    .describe('Agent loop configuration');

export type AgentLoopConfig = z.input<typeof AgentLoopConfigSchema>;
export type ValidatedAgentLoopConfig = z.output<typeof AgentLoopConfigSchema>;
