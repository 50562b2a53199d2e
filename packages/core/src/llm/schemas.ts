import { z } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LLMErrorCode } from './error-codes.js';
import { LLM_PROVIDERS } from './types.js';
import { MOCK_SCENARIOS } from './services/mock-scenarios.js';

export const DEFAULT_RETRY_DELAYS_MS = [2000, 4000, 8000] as const;

export const LLMConfigBaseSchema = z
    .object({
        provider: z
            .enum(LLM_PROVIDERS)
            .describe("Wire family to talk to ('openai-chat', 'openai-responses' or 'mock')"),

        model: z.string().trim().min(1).describe('Model name for the selected provider'),

        apiKey: z
            .string()
            .trim()
            .min(1)
            .optional()
            .describe('API key; falls back to OPENAI_API_KEY when omitted'),

        baseURL: z
            .string()
            .url()
            .optional()
            .describe('Base URL for OpenAI-compatible endpoints (e.g., https://api.openai.com/v1)'),

        maxOutputTokens: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Max tokens for model output'),

        temperature: z.number().min(0).max(2).optional().describe('Sampling temperature'),

        retryDelaysMs: z
            .array(z.number().int().nonnegative())
            .default([...DEFAULT_RETRY_DELAYS_MS])
            .describe('Waits before each connection retry on HTTP 429 or 5xx; empty disables retries'),

        scenario: z
            .enum(MOCK_SCENARIOS)
            .optional()
            .describe("Scripted scenario for the 'mock' provider"),
    })
    .strict();

/**
 * LLM configuration schema
 */
export const LLMConfigSchema = LLMConfigBaseSchema.superRefine((data, ctx) => {
    if (data.scenario !== undefined && data.provider !== 'mock') {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['scenario'],
            message: `'scenario' only applies to the 'mock' provider, not '${data.provider}'`,
            params: {
                code: LLMErrorCode.CONFIG_INVALID,
                scope: ErrorScope.LLM,
                type: ErrorType.USER,
            },
        });
    }
});

export type LLMConfig = z.input<typeof LLMConfigSchema>;
export type ValidatedLLMConfig = z.output<typeof LLMConfigSchema>;
