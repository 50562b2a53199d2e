/**
 * FileSystem Service Types
 */

/**
 * Resolved service configuration
 */
export interface FileSystemConfig {
    /** Relative paths resolve against this directory */
    workingDirectory: string;
    /** Files larger than this (bytes) are not read */
    maxFileSize: number;
    maxGlobResults: number;
    maxSearchResults: number;
}

/**
 * File content with metadata
 */
export interface FileContent {
    path: string;
    content: string;
    /** Lines returned */
    lines: number;
    /** Lines in the whole file */
    totalLines: number;
    /** True when lines after the returned range were left out */
    truncated: boolean;
    size: number;
}

export interface ReadFileOptions {
    /** Starting line number (1-based) */
    offset?: number | undefined;
    /** Maximum number of lines to read */
    limit?: number | undefined;
}

export interface WriteFileOptions {
    /** Create missing parent directories */
    createDirs?: boolean | undefined;
}

export interface WriteResult {
    path: string;
    bytesWritten: number;
    /** False when an existing file was overwritten */
    created: boolean;
}

export interface EditOperation {
    oldString: string;
    newString: string;
    replaceAll?: boolean | undefined;
}

export interface EditResult {
    path: string;
    changesCount: number;
    originalContent: string;
    newContent: string;
}

export interface GlobOptions {
    /** Base directory to search from */
    cwd?: string | undefined;
    maxResults?: number | undefined;
    signal?: AbortSignal | undefined;
}

export interface GlobResult {
    /** Absolute file paths, sorted */
    files: string[];
    totalFound: number;
    truncated: boolean;
}

export interface GrepOptions {
    /** Directory or single file to search (defaults to the working directory) */
    path?: string | undefined;
    /** Restricts the files searched under a directory */
    glob?: string | undefined;
    caseInsensitive?: boolean | undefined;
    maxResults?: number | undefined;
    signal?: AbortSignal | undefined;
}

export interface SearchMatch {
    file: string;
    lineNumber: number;
    line: string;
}

export interface SearchResult {
    matches: SearchMatch[];
    filesSearched: number;
    truncated: boolean;
}
