import { safeStringify } from '../utils/safe-stringify.js';

/** Sent in place of an empty tool result; providers reject empty tool content */
export const EMPTY_TOOL_OUTPUT = '(no output)';

/** Output of a call that was cancelled before it settled */
export const INTERRUPTED_OUTPUT = 'Interrupted by user';

/**
 * Text fed back to the model for a tool's return value.
 * Strings pass through; everything else is pretty-printed JSON.
 */
export function formatToolOutput(value: unknown): string {
    if (value === undefined || value === null) {
        return EMPTY_TOOL_OUTPUT;
    }
    const text = typeof value === 'string' ? value : safeStringify(value, { indent: 2 });
    return text.trim() === '' ? EMPTY_TOOL_OUTPUT : text;
}
