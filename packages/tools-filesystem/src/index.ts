/**
 * @stepwise/tools-filesystem
 *
 * File operation tools for the agent loop: read, write, edit, glob, grep.
 */

export { createFileSystemTools } from './tool-factory.js';
export type { FileSystemToolsOptions } from './tool-factory.js';
export {
    FileSystemToolsConfigSchema,
    FILESYSTEM_TOOL_NAMES,
    type FileSystemToolName,
    type FileSystemToolsConfig,
    type FileSystemToolsConfigInput,
} from './schemas.js';

// Service and errors
export { FileSystemService } from './filesystem-service.js';
export { FileSystemError } from './errors.js';
export { FileSystemErrorCode } from './error-codes.js';

export type {
    FileSystemConfig,
    FileContent,
    ReadFileOptions,
    WriteFileOptions,
    WriteResult,
    EditOperation,
    EditResult,
    GlobOptions,
    GlobResult,
    GrepOptions,
    SearchMatch,
    SearchResult,
} from './types.js';

// Individual tools
export { createReadFileTool } from './read-file-tool.js';
export { createWriteFileTool } from './write-file-tool.js';
export { createEditFileTool, buildUnifiedDiff } from './edit-file-tool.js';
export { createGlobFilesTool } from './glob-files-tool.js';
export { createGrepContentTool } from './grep-content-tool.js';
