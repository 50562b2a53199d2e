/**
 * @stepwise/tools-process
 *
 * Shell command execution for the agent loop.
 */

export { createProcessTools } from './tool-factory.js';
export type { ProcessToolsOptions } from './tool-factory.js';
export {
    ProcessToolsConfigSchema,
    type ProcessToolsConfig,
    type ProcessToolsConfigInput,
} from './schemas.js';

export { ProcessService } from './process-service.js';
export { createBashExecTool } from './bash-exec-tool.js';
export { ProcessError } from './errors.js';
export { ProcessErrorCode } from './error-codes.js';
export type { ExecuteOptions, OutputStream, ProcessConfig, ProcessResult } from './types.js';
