/**
 * Utility functions for converting various error types to proper Error instances
 * with meaningful messages instead of "[object Object]"
 */

import { safeStringify } from './safe-stringify.js';
import type { Logger } from '../logger/types.js';

/**
 * Converts any error value to an Error instance with a meaningful message
 *
 * @param error - The error value to convert (can be Error, object, string, etc.)
 * @returns Error instance with extracted or serialized message
 */
export function toError(error: unknown, logger?: Logger): Error {
    if (error instanceof Error) {
        return error;
    }

    if (error && typeof error === 'object') {
        // Provider SDKs often wrap the message: { error: { message } }
        if ('error' in error) {
            const inner = error.error;
            if (typeof inner === 'string') {
                return new Error(inner, { cause: error });
            }
            if (
                inner &&
                typeof inner === 'object' &&
                'message' in inner &&
                typeof inner.message === 'string'
            ) {
                logger?.debug(`Extracted error from error.error.message: ${inner.message}`);
                return new Error(inner.message, { cause: error });
            }
        }

        if ('message' in error && typeof error.message === 'string') {
            return new Error(error.message, { cause: error });
        }
        if ('details' in error && typeof error.details === 'string') {
            return new Error(error.details, { cause: error });
        }

        // Fallback to safe serialization for complex objects
        const serialized = safeStringify(error, { maxLen: 1000 });
        logger?.debug(`Falling back to safe serialization for error object: ${serialized}`);
        return new Error(serialized, { cause: error });
    }

    if (typeof error === 'string') {
        return new Error(error, { cause: error });
    }

    // For primitives and other types
    return new Error(String(error), { cause: error });
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
    return toError(error).message;
}
