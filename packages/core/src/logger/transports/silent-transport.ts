/**
 * Silent Transport
 *
 * A no-op transport that discards all log entries.
 * Used when logging needs to be completely suppressed (tests, embedded use).
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}

    destroy(): void {}
}
