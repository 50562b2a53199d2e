import type { FunctionTool, ResponseInputItem } from 'openai/resources/responses/responses';
import type { ConversationMessage } from '../../context/types.js';
import type { ToolDefinition } from '../types.js';
import { EMPTY_TOOL_OUTPUT } from '../../tools/output.js';

/**
 * Message formatter for the Responses API.
 *
 * Assistant text and each tool call become separate input items. Reasoning is not
 * replayed: the API only accepts reasoning items it issued itself.
 */
export class OpenAIResponsesMessageFormatter {
    format(history: readonly ConversationMessage[]): ResponseInputItem[] {
        const items: ResponseInputItem[] = [];

        for (const msg of history) {
            switch (msg.role) {
                case 'system':
                    items.push({ role: 'system', content: msg.content });
                    break;
                case 'user':
                    items.push({ role: 'user', content: msg.content });
                    break;
                case 'assistant': {
                    const text = msg.content
                        .filter((block) => block.type === 'text')
                        .map((block) => block.text)
                        .join('');
                    if (text !== '') {
                        items.push({ role: 'assistant', content: text });
                    }
                    for (const call of msg.toolCalls) {
                        items.push({
                            type: 'function_call',
                            call_id: call.id,
                            name: call.name,
                            arguments: call.arguments,
                        });
                    }
                    break;
                }
                case 'tool':
                    items.push({
                        type: 'function_call_output',
                        call_id: msg.toolCallId,
                        output: msg.content === '' ? EMPTY_TOOL_OUTPUT : msg.content,
                    });
                    break;
            }
        }

        return items;
    }

    formatTools(tools: readonly ToolDefinition[]): FunctionTool[] {
        return tools.map((tool) => ({
            type: 'function',
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
            strict: false,
        }));
    }
}
