/**
 * Grep Content Tool
 *
 * Searches file contents with a regular expression
 */

import { z } from 'zod';
import { defineTool } from '@stepwise/core';
import type { FileSystemService } from './filesystem-service.js';

const GrepContentInputSchema = z
    .object({
        pattern: z.string().min(1).describe('Regular expression pattern to search for'),
        path: z
            .string()
            .optional()
            .describe('Directory or file to search (defaults to working directory)'),
        glob: z
            .string()
            .optional()
            .describe('Glob pattern to filter files under a directory (e.g., "**/*.ts")'),
        case_insensitive: z
            .boolean()
            .optional()
            .default(false)
            .describe('Perform case-insensitive search (default: false)'),
        max_results: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of matches to return'),
    })
    .strict();

export function createGrepContentTool(fileSystemService: FileSystemService) {
    return defineTool({
        id: 'grep_content',
        aliases: ['grep'],
        description:
            'Search for a regular expression in files, line by line. Returns matching lines with file path and line number. Use glob to restrict the files searched (e.g., "**/*.ts"). Patterns prone to catastrophic backtracking are rejected.',
        inputSchema: GrepContentInputSchema,
        execute: async (input, context) => {
            const result = await fileSystemService.searchContent(input.pattern, {
                path: input.path,
                glob: input.glob,
                caseInsensitive: input.case_insensitive,
                maxResults: input.max_results,
                signal: context.abortSignal,
            });

            return {
                matches: result.matches.map((match) => ({
                    file: match.file,
                    line_number: match.lineNumber,
                    line: match.line,
                })),
                total_matches: result.matches.length,
                files_searched: result.filesSearched,
                truncated: result.truncated,
            };
        },
    });
}
