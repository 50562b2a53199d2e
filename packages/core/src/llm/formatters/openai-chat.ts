import type {
    ChatCompletionAssistantMessageParam,
    ChatCompletionMessageParam,
    ChatCompletionTool,
} from 'openai/resources';
import type { ConversationMessage, AssistantMessage } from '../../context/types.js';
import type { ToolDefinition } from '../types.js';
import { CHAT_REASONING_FIELDS } from '../stream/chat-completions.js';
import { EMPTY_TOOL_OUTPUT } from '../../tools/output.js';

function isChatReasoningField(field: string): boolean {
    return CHAT_REASONING_FIELDS.some((known) => known === field);
}

/**
 * Message formatter for the Chat Completions API.
 *
 * - The system prompt goes first, followed by any system messages in the history
 * - Assistant reasoning is sent back in the delta field it arrived in
 * - Tool results use the 'tool' role with tool_call_id
 */
export class OpenAIChatMessageFormatter {
    format(
        history: readonly ConversationMessage[],
        systemPrompt?: string
    ): ChatCompletionMessageParam[] {
        const formatted: ChatCompletionMessageParam[] = [];

        if (systemPrompt) {
            formatted.push({ role: 'system', content: systemPrompt });
        }

        for (const msg of history) {
            switch (msg.role) {
                case 'system':
                    formatted.push({ role: 'system', content: msg.content });
                    break;
                case 'user':
                    formatted.push({ role: 'user', content: msg.content });
                    break;
                case 'assistant':
                    formatted.push(this.formatAssistant(msg));
                    break;
                case 'tool':
                    formatted.push({
                        role: 'tool',
                        tool_call_id: msg.toolCallId,
                        content: msg.content === '' ? EMPTY_TOOL_OUTPUT : msg.content,
                    });
                    break;
            }
        }

        return formatted;
    }

    formatTools(tools: readonly ToolDefinition[]): ChatCompletionTool[] {
        return tools.map((tool) => ({
            type: 'function',
            function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
            },
        }));
    }

    private formatAssistant(
        msg: AssistantMessage
    ): ChatCompletionAssistantMessageParam & Record<string, unknown> {
        const text = msg.content
            .filter((block) => block.type === 'text')
            .map((block) => block.text)
            .join('');

        const param: ChatCompletionAssistantMessageParam & Record<string, unknown> = {
            role: 'assistant',
            content: text === '' && msg.toolCalls.length > 0 ? null : text,
        };

        for (const block of msg.content) {
            if (block.type !== 'thinking' || !block.signature) continue;
            if (!isChatReasoningField(block.signature)) continue;
            const previous = param[block.signature];
            param[block.signature] =
                typeof previous === 'string' ? previous + block.text : block.text;
        }

        if (msg.toolCalls.length > 0) {
            param.tool_calls = msg.toolCalls.map((call) => ({
                id: call.id,
                type: 'function',
                function: { name: call.name, arguments: call.arguments },
            }));
        }

        return param;
    }
}
