/**
 * File Transport
 *
 * Logs JSON lines to a file with automatic rotation based on file size.
 * Keeps a configurable number of rotated log files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File transport with size-based rotation
 */
export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize = 0;
    private isRotating = false;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.createWriteStream();
    }

    private createWriteStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            this.rotate().catch((error: unknown) => {
                console.error('FileTransport rotation error:', error);
            });
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Renames the current file to .1, shifts older files up (.1 -> .2, ...),
     * drops the oldest beyond maxFiles, then flushes buffered lines
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }
        this.isRotating = true;

        try {
            const current = this.writeStream;
            if (current) {
                await new Promise<void>((resolve) => current.end(() => resolve()));
                this.writeStream = null;
            }

            await this.removeIfPresent(`${this.filePath}.${this.maxFiles}`);
            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await this.renameIfPresent(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await this.renameIfPresent(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.writeStream = this.createWriteStream();
        } finally {
            this.isRotating = false;
        }

        await this.flushPendingLogs();
    }

    private async removeIfPresent(file: string): Promise<void> {
        try {
            await fs.promises.unlink(file);
        } catch (error) {
            if (!isMissingFile(error)) throw error;
        }
    }

    private async renameIfPresent(from: string, to: string): Promise<void> {
        try {
            await fs.promises.rename(from, to);
        } catch (error) {
            if (!isMissingFile(error)) throw error;
        }
    }

    private async flushPendingLogs(): Promise<void> {
        while (this.writeStream) {
            const line = this.pendingLogs.shift();
            if (line === undefined) {
                return;
            }
            const lineSize = Buffer.byteLength(line, 'utf8');

            if (this.currentSize + lineSize > this.maxSize && this.currentSize > 0) {
                this.pendingLogs.unshift(line);
                await this.rotate();
                return;
            }

            this.writeStream.write(line);
            this.currentSize += lineSize;
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    destroy(): Promise<void> {
        const stream = this.writeStream;
        this.writeStream = null;
        if (!stream) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => stream.end(() => resolve()));
    }
}
