/**
 * Edit File Tool
 *
 * Replaces text in a file and reports the change as a unified diff
 */

import { z } from 'zod';
import { createPatch } from 'diff';
import { defineTool } from '@stepwise/core';
import type { FileSystemService } from './filesystem-service.js';

const EditFileInputSchema = z
    .object({
        file_path: z.string().min(1).describe('Path to the file to edit'),
        old_string: z
            .string()
            .min(1)
            .describe('Text to replace (must be unique unless replace_all is true)'),
        new_string: z.string().describe('Replacement text'),
        replace_all: z
            .boolean()
            .optional()
            .default(false)
            .describe('Replace all occurrences (default: false, requires unique match)'),
    })
    .strict();

/**
 * Unified diff of an edit, with added and removed line counts
 */
export function buildUnifiedDiff(
    filePath: string,
    originalContent: string,
    newContent: string
): { unified: string; additions: number; deletions: number } {
    const unified = createPatch(filePath, originalContent, newContent, 'before', 'after', {
        context: 3,
    });
    const additions = (unified.match(/^\+(?!\+\+)/gm) ?? []).length;
    const deletions = (unified.match(/^-(?!--)/gm) ?? []).length;
    return { unified, additions, deletions };
}

export function createEditFileTool(fileSystemService: FileSystemService) {
    return defineTool({
        id: 'edit_file',
        description:
            'Edit a file by replacing text. By default old_string must occur exactly once in the file; set replace_all=true to replace every occurrence. Returns the path, the number of replacements and a unified diff of the change.',
        inputSchema: EditFileInputSchema,
        execute: async (input) => {
            const result = await fileSystemService.editFile(input.file_path, {
                oldString: input.old_string,
                newString: input.new_string,
                replaceAll: input.replace_all,
            });
            const diff = buildUnifiedDiff(result.path, result.originalContent, result.newContent);

            return {
                path: result.path,
                changes_count: result.changesCount,
                additions: diff.additions,
                deletions: diff.deletions,
                diff: diff.unified,
            };
        },
    });
}
