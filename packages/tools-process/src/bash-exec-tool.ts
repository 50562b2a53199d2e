/**
 * Bash Execute Tool
 *
 * Runs a shell command and returns its output
 */

import { z } from 'zod';
import { defineTool } from '@stepwise/core';
import type { ProcessService } from './process-service.js';

const BashExecInputSchema = z
    .object({
        command: z.string().min(1).describe('Shell command to execute'),
        timeout: z
            .number()
            .int()
            .positive()
            .max(600000)
            .optional()
            .describe('Timeout in milliseconds (max: 600000 = 10 minutes)'),
        cwd: z
            .string()
            .optional()
            .describe('Working directory, relative to the project root (optional)'),
    })
    .strict();

export function createBashExecTool(processService: ProcessService) {
    return defineTool({
        id: 'bash_exec',
        aliases: ['bash'],
        description: `Execute a shell command in the project root directory.

Use this for terminal operations like git, npm or running tests. Prefer the file tools for file work:
- File search: glob_files
- Content search: grep_content
- Read files: read_file
- Edit files: edit_file
- Write files: write_file

Usage notes:
- Each command runs in a fresh shell, so cd does not persist between calls. Use cwd instead.
- Quote paths that contain spaces.
- Chain dependent commands with && in a single call.
- Output past the configured limit is truncated.
- The exit code is returned; a non-zero exit is not an error.`,
        inputSchema: BashExecInputSchema,
        execute: async (input, context) => {
            const result = await processService.executeCommand(input.command, {
                cwd: input.cwd,
                timeout: input.timeout,
                abortSignal: context.abortSignal,
                onOutput: () => context.reportProgress(),
            });

            return {
                stdout: result.stdout,
                stderr: result.stderr,
                exit_code: result.exitCode,
                duration: result.duration,
                ...(result.truncated && { truncated: true }),
            };
        },
    });
}
