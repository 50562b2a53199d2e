import type { Logger, Tool } from '@stepwise/core';
import { FileSystemService } from './filesystem-service.js';
import { createReadFileTool } from './read-file-tool.js';
import { createWriteFileTool } from './write-file-tool.js';
import { createEditFileTool } from './edit-file-tool.js';
import { createGlobFilesTool } from './glob-files-tool.js';
import { createGrepContentTool } from './grep-content-tool.js';
import {
    FILESYSTEM_TOOL_NAMES,
    FileSystemToolsConfigSchema,
    type FileSystemToolName,
    type FileSystemToolsConfigInput,
} from './schemas.js';

export interface FileSystemToolsOptions {
    config?: FileSystemToolsConfigInput | undefined;
    logger: Logger;
}

/**
 * Create the filesystem tools sharing one FileSystemService.
 * Throws a ZodError when the config is invalid.
 */
export function createFileSystemTools(options: FileSystemToolsOptions): Tool[] {
    const config = FileSystemToolsConfigSchema.parse(options.config ?? {});

    const fileSystemService = new FileSystemService(
        {
            workingDirectory: config.workingDirectory ?? process.cwd(),
            maxFileSize: config.maxFileSize,
            maxGlobResults: config.maxGlobResults,
            maxSearchResults: config.maxSearchResults,
        },
        options.logger
    );

    const toolCreators: Record<FileSystemToolName, () => Tool> = {
        read_file: () => createReadFileTool(fileSystemService),
        write_file: () => createWriteFileTool(fileSystemService),
        edit_file: () => createEditFileTool(fileSystemService),
        glob_files: () => createGlobFilesTool(fileSystemService),
        grep_content: () => createGrepContentTool(fileSystemService),
    };

    const toolsToCreate = config.enabledTools ?? FILESYSTEM_TOOL_NAMES;
    return toolsToCreate.map((toolName) => toolCreators[toolName]());
}
