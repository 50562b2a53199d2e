import type { ZodTypeAny } from 'zod';
import type { Tool } from './types.js';

/**
 * Typed identity helper for defining tools.
 * The object literal is contextually typed, so `execute` receives `z.output` of `inputSchema`.
 */
export function defineTool<const TSchema extends ZodTypeAny>(tool: Tool<TSchema>): Tool<TSchema> {
    return tool;
}
