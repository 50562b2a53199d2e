/**
 * FileSystem Service
 *
 * File operations behind the filesystem tools. Relative paths resolve against the
 * configured working directory; nothing outside it is blocked.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob, escape } from 'glob';
import safeRegex from 'safe-regex';
import { LogComponent, errorMessage, isRuntimeError, type Logger } from '@stepwise/core';
import { FileSystemError } from './errors.js';
import type {
    EditOperation,
    EditResult,
    FileContent,
    FileSystemConfig,
    GlobOptions,
    GlobResult,
    GrepOptions,
    ReadFileOptions,
    SearchMatch,
    SearchResult,
    WriteFileOptions,
    WriteResult,
} from './types.js';

const IGNORED_DIRECTORIES = ['**/node_modules/**', '**/.git/**'];

function errnoCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export class FileSystemService {
    private readonly config: FileSystemConfig;
    private readonly logger: Logger;

    constructor(config: FileSystemConfig, logger: Logger) {
        this.config = config;
        this.logger = logger.createChild(LogComponent.FILESYSTEM);
    }

    getWorkingDirectory(): string {
        return this.config.workingDirectory;
    }

    resolvePath(filePath: string): string {
        return path.resolve(this.config.workingDirectory, filePath);
    }

    /**
     * Read a text file, optionally a line range of it
     */
    async readFile(filePath: string, options: ReadFileOptions = {}): Promise<FileContent> {
        const resolved = this.resolvePath(filePath);
        const raw = await this.readWholeFile(resolved);

        const allLines = raw.content.split('\n');
        const start = options.offset !== undefined ? Math.max(options.offset - 1, 0) : 0;
        const end =
            options.limit !== undefined
                ? Math.min(start + options.limit, allLines.length)
                : allLines.length;
        const selected = allLines.slice(start, end);

        return {
            path: resolved,
            content: selected.join('\n'),
            lines: selected.length,
            totalLines: allLines.length,
            truncated: end < allLines.length,
            size: raw.size,
        };
    }

    async writeFile(
        filePath: string,
        content: string,
        options: WriteFileOptions = {}
    ): Promise<WriteResult> {
        const resolved = this.resolvePath(filePath);
        const existed = await this.exists(resolved);

        try {
            if (options.createDirs) {
                await fs.mkdir(path.dirname(resolved), { recursive: true });
            }
            await fs.writeFile(resolved, content, 'utf-8');
        } catch (error) {
            throw FileSystemError.writeFailed(resolved, errorMessage(error));
        }

        const bytesWritten = Buffer.byteLength(content, 'utf-8');
        this.logger.debug(`Wrote ${bytesWritten} bytes to ${resolved}`);
        return { path: resolved, bytesWritten, created: !existed };
    }

    /**
     * Replace `oldString` with `newString`. The match must be unique unless `replaceAll` is set.
     */
    async editFile(filePath: string, operation: EditOperation): Promise<EditResult> {
        const resolved = this.resolvePath(filePath);
        const { content: originalContent } = await this.readWholeFile(resolved);

        const occurrences = originalContent.split(operation.oldString).length - 1;
        if (occurrences === 0) {
            throw FileSystemError.stringNotFound(resolved, operation.oldString);
        }
        if (occurrences > 1 && !operation.replaceAll) {
            throw FileSystemError.stringNotUnique(resolved, occurrences);
        }

        // split/join keeps `$` sequences in newString literal
        const newContent = originalContent.split(operation.oldString).join(operation.newString);

        try {
            await fs.writeFile(resolved, newContent, 'utf-8');
        } catch (error) {
            throw FileSystemError.writeFailed(resolved, errorMessage(error));
        }

        this.logger.debug(`Edited ${resolved} (${occurrences} replacement(s))`);
        return { path: resolved, changesCount: occurrences, originalContent, newContent };
    }

    async globFiles(pattern: string, options: GlobOptions = {}): Promise<GlobResult> {
        const cwd = this.resolvePath(options.cwd ?? '.');
        const maxResults = options.maxResults ?? this.config.maxGlobResults;

        const files = await this.runGlob(pattern, cwd, options.signal);
        return {
            files: files.slice(0, maxResults),
            totalFound: files.length,
            truncated: files.length > maxResults,
        };
    }

    /**
     * Search file contents line by line with a regular expression
     */
    async searchContent(pattern: string, options: GrepOptions = {}): Promise<SearchResult> {
        const regex = this.compilePattern(pattern, options.caseInsensitive ?? false);
        const maxResults = options.maxResults ?? this.config.maxSearchResults;
        const target = this.resolvePath(options.path ?? '.');

        let stats: Stats;
        try {
            stats = await fs.stat(target);
        } catch (error) {
            if (errnoCode(error) === 'ENOENT') {
                throw FileSystemError.fileNotFound(target);
            }
            throw FileSystemError.searchFailed(pattern, errorMessage(error));
        }

        // A single file is searched through the same glob path, with its name escaped
        const files = stats.isFile()
            ? await this.runGlob(escape(path.basename(target)), path.dirname(target), options.signal)
            : await this.runGlob(options.glob ?? '**/*', target, options.signal);

        const matches: SearchMatch[] = [];
        let filesSearched = 0;
        let truncated = false;

        for (const file of files) {
            options.signal?.throwIfAborted();

            const content = await this.readSearchable(file);
            if (content === undefined) continue;
            filesSearched++;

            const lines = content.split('\n');
            for (let index = 0; index < lines.length; index++) {
                const line = lines[index];
                if (line === undefined || !regex.test(line)) continue;
                if (matches.length >= maxResults) {
                    truncated = true;
                    break;
                }
                matches.push({ file, lineNumber: index + 1, line });
            }
            if (truncated) break;
        }

        return { matches, filesSearched, truncated };
    }

    private compilePattern(pattern: string, caseInsensitive: boolean): RegExp {
        let regex: RegExp;
        try {
            regex = new RegExp(pattern, caseInsensitive ? 'i' : '');
        } catch (error) {
            throw FileSystemError.invalidPattern(pattern, errorMessage(error));
        }
        if (!safeRegex(regex)) {
            throw FileSystemError.invalidPattern(
                pattern,
                'pattern may cause catastrophic backtracking'
            );
        }
        return regex;
    }

    private async runGlob(
        pattern: string,
        cwd: string,
        signal: AbortSignal | undefined
    ): Promise<string[]> {
        try {
            const files = await glob(pattern, {
                cwd,
                absolute: true,
                nodir: true,
                follow: false,
                ignore: IGNORED_DIRECTORIES,
                ...(signal !== undefined && { signal }),
            });
            return files.sort();
        } catch (error) {
            if (signal?.aborted) throw error;
            throw FileSystemError.globFailed(pattern, errorMessage(error));
        }
    }

    private async readWholeFile(resolved: string): Promise<{ content: string; size: number }> {
        try {
            const stats = await fs.stat(resolved);
            if (!stats.isFile()) {
                throw FileSystemError.notAFile(resolved);
            }
            if (stats.size > this.config.maxFileSize) {
                throw FileSystemError.fileTooLarge(resolved, stats.size, this.config.maxFileSize);
            }
            const content = await fs.readFile(resolved, 'utf-8');
            return { content, size: stats.size };
        } catch (error) {
            if (isRuntimeError(error)) throw error;
            if (errnoCode(error) === 'ENOENT') {
                throw FileSystemError.fileNotFound(resolved);
            }
            throw FileSystemError.readFailed(resolved, errorMessage(error));
        }
    }

    /**
     * Content of a file worth searching, or undefined for large, binary or unreadable files
     */
    private async readSearchable(file: string): Promise<string | undefined> {
        try {
            const stats = await fs.stat(file);
            if (stats.size > this.config.maxFileSize) return undefined;
            const content = await fs.readFile(file, 'utf-8');
            return content.includes('\0') ? undefined : content;
        } catch (error) {
            this.logger.debug(`Skipping unreadable file ${file}: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private async exists(resolved: string): Promise<boolean> {
        try {
            await fs.access(resolved);
            return true;
        } catch {
            return false;
        }
    }
}
