/**
 * Logger Configuration Schemas
 *
 * The agent streams model output to stdout, so console logs default to stderr.
 */

import { z } from 'zod';

const SilentTransportSchema = z
    .object({
        type: z.literal('silent'),
    })
    .strict()
    .describe('Drops every entry, for embedding the loop where logs are unwanted');

const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Color each line by level with chalk'),
        output: z
            .enum(['stderr', 'split'])
            .default('stderr')
            .describe("Stream for entries; 'split' sends debug and info to stdout"),
    })
    .strict()
    .describe('Human-readable lines on the terminal running the agent');

const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: z.string().describe('Absolute path of the JSON-lines log, e.g. a session log file'),
        maxSize: z
            .number()
            .positive()
            .default(10 * 1024 * 1024)
            .describe('Bytes written before the file rotates'),
        maxFiles: z
            .number()
            .int()
            .positive()
            .default(5)
            .describe('Rotated files kept beside the active one'),
    })
    .strict()
    .describe('JSON lines on disk for replaying a session after the fact');

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z
            .enum(['debug', 'info', 'warn', 'error', 'silly'])
            .default('error')
            .describe('Lowest level written; shared by the loop, dispatcher and tool loggers'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true, output: 'stderr' }])
            .describe('Where entries go; every transport receives every entry'),
    })
    .strict()
    .describe('Logging for the agent runtime and its tools');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
