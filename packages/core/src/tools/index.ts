/**
 * Tool capability set and dispatcher
 */

export * from './types.js';
export * from './schemas.js';
export { defineTool } from './define-tool.js';
export { ToolRegistry } from './registry.js';
export { ToolDispatcher } from './dispatcher.js';
export type { DispatchOptions, DispatchOutcome, ToolDispatcherOptions } from './dispatcher.js';
export { EMPTY_TOOL_OUTPUT, INTERRUPTED_OUTPUT, formatToolOutput } from './output.js';
export { ToolError } from './errors.js';
export { ToolErrorCode } from './error-codes.js';
