/**
 * Read File Tool
 *
 * Reads file contents with size limits and line pagination
 */

import { z } from 'zod';
import { defineTool } from '@stepwise/core';
import type { FileSystemService } from './filesystem-service.js';

const ReadFileInputSchema = z
    .object({
        file_path: z
            .string()
            .min(1)
            .describe('Path to the file to read (relative paths resolve against the working directory)'),
        offset: z
            .number()
            .int()
            .min(1)
            .optional()
            .describe('Starting line number (1-based, optional)'),
        limit: z
            .number()
            .int()
            .positive()
            .optional()
            .describe('Maximum number of lines to read (optional)'),
    })
    .strict();

export function createReadFileTool(fileSystemService: FileSystemService) {
    return defineTool({
        id: 'read_file',
        description:
            'Read the contents of a file with optional pagination. Returns the content, the number of lines returned, the total line count, and whether lines after the range were left out. Use offset and limit to read sections of large files.',
        inputSchema: ReadFileInputSchema,
        execute: async (input) => {
            const result = await fileSystemService.readFile(input.file_path, {
                offset: input.offset,
                limit: input.limit,
            });

            return {
                path: result.path,
                content: result.content,
                lines: result.lines,
                total_lines: result.totalLines,
                truncated: result.truncated,
                size: result.size,
            };
        },
    });
}
