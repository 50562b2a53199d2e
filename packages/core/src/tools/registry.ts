import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import type { ToolDefinition } from '../llm/types.js';
import { convertZodSchemaToJsonSchema } from '../utils/schema.js';
import { ToolError } from './errors.js';
import type { Tool } from './types.js';

/**
 * Capability set the dispatcher resolves tool calls against.
 *
 * Ids and aliases share one namespace; registering a name that is already taken throws.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, Tool>();
    private readonly aliases = new Map<string, string>();
    private readonly logger: Logger;

    constructor(logger: Logger, tools: readonly Tool[] = []) {
        this.logger = logger.createChild(LogComponent.TOOLS);
        for (const tool of tools) {
            this.register(tool);
        }
    }

    register(tool: Tool): void {
        const names = [tool.id, ...(tool.aliases ?? [])];
        for (const name of names) {
            if (this.has(name)) {
                throw ToolError.alreadyRegistered(name);
            }
        }
        this.tools.set(tool.id, tool);
        for (const alias of tool.aliases ?? []) {
            this.aliases.set(alias, tool.id);
        }
        this.logger.debug(`Registered tool '${tool.id}'`);
    }

    unregister(id: string): boolean {
        const tool = this.tools.get(id);
        if (!tool) {
            return false;
        }
        this.tools.delete(id);
        for (const alias of tool.aliases ?? []) {
            this.aliases.delete(alias);
        }
        return true;
    }

    /**
     * Look up a tool by id or alias
     */
    resolve(name: string): Tool | undefined {
        const direct = this.tools.get(name);
        if (direct) {
            return direct;
        }
        const id = this.aliases.get(name);
        return id !== undefined ? this.tools.get(id) : undefined;
    }

    has(name: string): boolean {
        return this.tools.has(name) || this.aliases.has(name);
    }

    list(): Tool[] {
        return Array.from(this.tools.values());
    }

    /**
     * Function definitions for the provider, in registration order
     */
    getDefinitions(): ToolDefinition[] {
        return this.list().map((tool) => ({
            name: tool.id,
            description: tool.description,
            parameters: convertZodSchemaToJsonSchema(tool.inputSchema, this.logger),
        }));
    }
}
