import { z } from 'zod';

export const FILESYSTEM_TOOL_NAMES = [
    'read_file',
    'write_file',
    'edit_file',
    'glob_files',
    'grep_content',
] as const;
export type FileSystemToolName = (typeof FILESYSTEM_TOOL_NAMES)[number];

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

export const FileSystemToolsConfigSchema = z
    .object({
        workingDirectory: z
            .string()
            .optional()
            .describe('Directory relative paths resolve against (defaults to process.cwd())'),
        maxFileSize: z
            .number()
            .int()
            .positive()
            .default(DEFAULT_MAX_FILE_SIZE)
            .describe('Largest file, in bytes, the tools will read'),
        maxGlobResults: z
            .number()
            .int()
            .positive()
            .default(1000)
            .describe('Upper bound on glob_files results'),
        maxSearchResults: z
            .number()
            .int()
            .positive()
            .default(100)
            .describe('Upper bound on grep_content matches'),
        enabledTools: z
            .array(z.enum(FILESYSTEM_TOOL_NAMES))
            .optional()
            .describe('Subset of tools to create (defaults to all)'),
    })
    .strict()
    .describe('Filesystem tools configuration');

export type FileSystemToolsConfigInput = z.input<typeof FileSystemToolsConfigSchema>;
export type FileSystemToolsConfig = z.output<typeof FileSystemToolsConfigSchema>;
