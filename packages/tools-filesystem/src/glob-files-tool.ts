/**
 * Glob Files Tool
 *
 * Finds files by glob pattern
 */

import { z } from 'zod';
import { defineTool } from '@stepwise/core';
import type { FileSystemService } from './filesystem-service.js';

const GlobFilesInputSchema = z
    .object({
        pattern: z
            .string()
            .min(1)
            .describe('Glob pattern to match files (e.g., "**/*.ts", "src/**/*.js")'),
        path: z
            .string()
            .optional()
            .describe('Base directory to search from (defaults to working directory)'),
        max_results: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of results to return'),
    })
    .strict();

export function createGlobFilesTool(fileSystemService: FileSystemService) {
    return defineTool({
        id: 'glob_files',
        aliases: ['find'],
        description:
            'Find files matching a glob pattern such as "**/*.ts". Directories, node_modules and .git are skipped. Returns sorted absolute paths, the total number found, and whether the list was cut at max_results.',
        inputSchema: GlobFilesInputSchema,
        execute: async (input, context) => {
            const result = await fileSystemService.globFiles(input.pattern, {
                cwd: input.path,
                maxResults: input.max_results,
                signal: context.abortSignal,
            });

            return {
                files: result.files,
                total_found: result.totalFound,
                truncated: result.truncated,
            };
        },
    });
}
