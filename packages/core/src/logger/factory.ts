/**
 * Logger Factory
 *
 * Creates logger instances from (unvalidated) logger configuration.
 */

import { LoggerConfigSchema, type LoggerConfigInput } from './schemas.js';
import type { Logger } from './types.js';
import { LogComponent } from './types.js';
import { StepwiseLogger } from './logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    /** Logger configuration; defaults apply to anything omitted */
    config?: LoggerConfigInput;
    /** Agent ID for multi-agent isolation */
    agentId: string;
    /** Component identifier (defaults to AGENT) */
    component?: LogComponent;
}

/**
 * Create a logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'info' },
 *   agentId: 'my-agent',
 * });
 *
 * logger.info('Agent started');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config = {}, agentId, component = LogComponent.AGENT } = options;

    const parsed = LoggerConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw LoggerError.invalidConfig(parsed.error.issues[0]?.message ?? 'invalid', {
            issues: parsed.error.issues,
        });
    }

    return new StepwiseLogger({
        level: parsed.data.level,
        component,
        agentId,
        transports: createTransports(parsed.data.transports),
    });
}
