/**
 * Write File Tool
 *
 * Writes content to a file, creating or overwriting it
 */

import { z } from 'zod';
import { defineTool } from '@stepwise/core';
import type { FileSystemService } from './filesystem-service.js';

const WriteFileInputSchema = z
    .object({
        file_path: z.string().min(1).describe('Path to the file to write'),
        content: z.string().describe('Content to write to the file'),
        create_dirs: z
            .boolean()
            .optional()
            .default(false)
            .describe('Create parent directories if they do not exist (default: false)'),
    })
    .strict();

export function createWriteFileTool(fileSystemService: FileSystemService) {
    return defineTool({
        id: 'write_file',
        description:
            'Write content to a file. Creates the file if it does not exist and overwrites it otherwise. Set create_dirs=true to create missing parent directories. Returns the path, bytes written and whether the file is new.',
        inputSchema: WriteFileInputSchema,
        execute: async (input) => {
            const result = await fileSystemService.writeFile(input.file_path, input.content, {
                createDirs: input.create_dirs,
            });

            return {
                path: result.path,
                bytes_written: result.bytesWritten,
                created: result.created,
            };
        },
    });
}
