import type { Logger, Tool } from '@stepwise/core';
import { ProcessService } from './process-service.js';
import { createBashExecTool } from './bash-exec-tool.js';
import { ProcessToolsConfigSchema, type ProcessToolsConfigInput } from './schemas.js';

export interface ProcessToolsOptions {
    config?: ProcessToolsConfigInput | undefined;
    logger: Logger;
}

/**
 * Create the process tools. Throws a ZodError when the config is invalid.
 */
export function createProcessTools(options: ProcessToolsOptions): Tool[] {
    const config = ProcessToolsConfigSchema.parse(options.config ?? {});

    const processService = new ProcessService(
        {
            workingDirectory: config.workingDirectory ?? process.cwd(),
            defaultTimeout: config.defaultTimeout,
            maxTimeout: config.maxTimeout,
            maxOutputBytes: config.maxOutputBytes,
            environment: config.environment,
        },
        options.logger
    );

    return [createBashExecTool(processService)];
}
