import { StepwiseRuntimeError, ErrorScope, ErrorType } from '@stepwise/core';
import { FileSystemErrorCode } from './error-codes.js';

/**
 * FileSystem error factory
 * Each method creates a StepwiseRuntimeError with FILESYSTEM scope
 */
export class FileSystemError {
    static fileNotFound(path: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.FILE_NOT_FOUND,
            ErrorScope.FILESYSTEM,
            ErrorType.NOT_FOUND,
            `File not found: ${path}`,
            { path }
        );
    }

    static notAFile(path: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.NOT_A_FILE,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `Not a file: ${path}`,
            { path }
        );
    }

    static fileTooLarge(path: string, size: number, maxSize: number) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.FILE_TOO_LARGE,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `File too large: ${path} is ${size} bytes (max ${maxSize})`,
            { path, size, maxSize },
            'Read a smaller range with offset and limit, or raise maxFileSize'
        );
    }

    static readFailed(path: string, cause: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.READ_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Failed to read ${path}: ${cause}`,
            { path, cause }
        );
    }

    static writeFailed(path: string, cause: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.WRITE_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Failed to write ${path}: ${cause}`,
            { path, cause }
        );
    }

    static stringNotFound(path: string, searchString: string) {
        const preview = searchString.length > 50 ? `${searchString.slice(0, 50)}...` : searchString;
        return new StepwiseRuntimeError(
            FileSystemErrorCode.STRING_NOT_FOUND,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `String not found in ${path}: "${preview}"`,
            { path, searchString: preview }
        );
    }

    static stringNotUnique(path: string, occurrences: number) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.STRING_NOT_UNIQUE,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `String found ${occurrences} times in ${path}`,
            { path, occurrences },
            'Set replace_all to true, or include more surrounding text to make old_string unique'
        );
    }

    static invalidPattern(pattern: string, reason: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.INVALID_PATTERN,
            ErrorScope.FILESYSTEM,
            ErrorType.USER,
            `Invalid search pattern '${pattern}': ${reason}`,
            { pattern, reason }
        );
    }

    static globFailed(pattern: string, cause: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.GLOB_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Glob '${pattern}' failed: ${cause}`,
            { pattern, cause }
        );
    }

    static searchFailed(pattern: string, cause: string) {
        return new StepwiseRuntimeError(
            FileSystemErrorCode.SEARCH_FAILED,
            ErrorScope.FILESYSTEM,
            ErrorType.SYSTEM,
            `Search for '${pattern}' failed: ${cause}`,
            { pattern, cause }
        );
    }
}
