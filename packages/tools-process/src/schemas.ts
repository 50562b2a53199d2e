import { z } from 'zod';

const DEFAULT_TIMEOUT = 120000; // 2 minutes
const DEFAULT_MAX_TIMEOUT = 600000; // 10 minutes
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024; // 1MB

export const ProcessToolsConfigSchema = z
    .object({
        workingDirectory: z
            .string()
            .optional()
            .describe('Working directory for commands (defaults to process.cwd())'),
        defaultTimeout: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_TIMEOUT)
            .describe('Timeout in milliseconds when a call gives none'),
        maxTimeout: z
            .number()
            .int()
            .positive()
            .max(DEFAULT_MAX_TIMEOUT)
            .default(DEFAULT_MAX_TIMEOUT)
            .describe(
                `Maximum timeout for commands in milliseconds (max: ${DEFAULT_MAX_TIMEOUT / 1000 / 60} minutes)`
            ),
        maxOutputBytes: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_OUTPUT_BYTES)
            .describe('Combined stdout and stderr kept per command, in bytes'),
        environment: z
            .record(z.string())
            .default({})
            .describe('Custom environment variables to set for command execution'),
    })
    .strict()
    .describe('Process tools configuration');

export type ProcessToolsConfigInput = z.input<typeof ProcessToolsConfigSchema>;
export type ProcessToolsConfig = z.output<typeof ProcessToolsConfigSchema>;
