import type { ZodTypeAny } from 'zod';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Logger } from '../logger/types.js';

const JsonObjectSchema = z.record(z.unknown());

const EMPTY_OBJECT_SCHEMA = { type: 'object', properties: {} };

/**
 * Convert Zod schema to JSON Schema format for tool parameters
 */
export function convertZodSchemaToJsonSchema(
    zodSchema: ZodTypeAny,
    logger?: Logger
): Record<string, unknown> {
    try {
        const parsed = JsonObjectSchema.safeParse(
            zodToJsonSchema(zodSchema, { $refStrategy: 'none' })
        );
        if (!parsed.success) {
            return { ...EMPTY_OBJECT_SCHEMA };
        }
        // Providers reject the draft marker on function parameters
        const { $schema: _draft, ...schema } = parsed.data;
        return schema;
    } catch (error) {
        logger?.warn(
            `Failed to convert Zod schema to JSON Schema: ${error instanceof Error ? error.message : String(error)}`
        );
        return { ...EMPTY_OBJECT_SCHEMA };
    }
}
