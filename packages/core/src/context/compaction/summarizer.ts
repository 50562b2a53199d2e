import type { LLMProvider } from '../../llm/types.js';
import type { Logger } from '../../logger/types.js';
import type { MessageDraft } from '../types.js';
import type { SummarizeOptions, Summarizer } from './types.js';
import { abortReason } from '../../utils/abort.js';

export const SUMMARY_HEADER = '[Session Compaction Summary]';

export const DEFAULT_SUMMARY_PROMPT = `You are a conversation summarizer creating a structured summary for session continuation.

Analyze the conversation and produce a summary in the following XML format:

<session_compaction>
  <conversation_history>
    A concise summary of what happened in the conversation:
    - Tasks attempted and their outcomes (success/failure/in-progress)
    - Important decisions made
    - Key information discovered (file paths, configurations, errors encountered)
    - Tools used and their results
  </conversation_history>

  <current_task>
    The most recent task or instruction the user requested that may still be in progress.
    Be specific - include the exact request and current status.
  </current_task>

  <important_context>
    Critical state that must be preserved:
    - File paths being worked on
    - Variable values or configurations
    - Error messages that need addressing
    - Any pending actions or next steps
  </important_context>
</session_compaction>

IMPORTANT: The assistant will continue working based on this summary. Ensure the current_task section clearly states what needs to be done next.

Conversation to summarize:
{conversation}`;

export interface LLMSummarizerOptions {
    maxSummaryTokens: number;
    /** Template with a {conversation} placeholder */
    summaryPrompt?: string | undefined;
}

function messageText(message: MessageDraft): string {
    if (message.role === 'assistant') {
        return message.content
            .filter((block) => block.type === 'text')
            .map((block) => block.text)
            .join('\n');
    }
    return message.content;
}

/**
 * Format messages for the summary prompt.
 */
export function formatMessagesForSummary(messages: readonly MessageDraft[]): string {
    return messages
        .map((msg) => {
            let content = messageText(msg) || '[no content]';

            // Truncate very long messages
            if (content.length > 2000) {
                content = content.slice(0, 2000) + '... [truncated]';
            }

            if (msg.role === 'tool') {
                return `TOOL (${msg.toolName}): ${content.slice(0, 500)}${content.length > 500 ? '...' : ''}`;
            }

            if (msg.role === 'assistant' && msg.toolCalls.length > 0) {
                const toolNames = msg.toolCalls.map((tc) => tc.name).join(', ');
                content += `\n[Used tools: ${toolNames}]`;
            }

            return `${msg.role.toUpperCase()}: ${content}`;
        })
        .join('\n\n');
}

/**
 * Deterministic summary used when the summary call fails.
 */
export function createFallbackSummary(
    messages: readonly MessageDraft[],
    currentTask?: string
): string {
    const userTopics = messages
        .filter((m) => m.role === 'user')
        .slice(-3)
        .map((m) => messageText(m).slice(0, 100))
        .join('; ');

    const toolsUsed = [
        ...new Set(
            messages.flatMap((m) => (m.role === 'assistant' ? m.toolCalls.map((tc) => tc.name) : []))
        ),
    ].join(', ');

    let fallback = `${SUMMARY_HEADER}
<session_compaction>
  <conversation_history>
    User discussed: ${userTopics || 'various topics'}
    Tools used: ${toolsUsed || 'none'}
    Messages summarized: ${messages.length}
  </conversation_history>`;

    if (currentTask) {
        fallback += `
  <current_task>
    ${currentTask.slice(0, 500)}${currentTask.length > 500 ? '...' : ''}
  </current_task>`;
    }

    fallback += `
  <important_context>
    Note: This is a fallback summary due to LLM error. Context may be incomplete.
  </important_context>
</session_compaction>`;

    return fallback;
}

/**
 * Summarizer backed by the configured provider.
 * Falls back to a deterministic summary when the call fails; cancellation is not a failure.
 */
export class LLMSummarizer implements Summarizer {
    private readonly summaryPrompt: string;

    constructor(
        private readonly provider: LLMProvider,
        private readonly options: LLMSummarizerOptions,
        private readonly logger: Logger
    ) {
        this.summaryPrompt = options.summaryPrompt ?? DEFAULT_SUMMARY_PROMPT;
    }

    async summarize(messages: readonly MessageDraft[], options: SummarizeOptions): Promise<string> {
        const { signal, currentTask } = options;

        let conversation = formatMessagesForSummary(messages);
        if (currentTask) {
            conversation += `\n\n--- CURRENT TASK (most recent user request) ---\n${currentTask}`;
        }
        const prompt = this.summaryPrompt.replace('{conversation}', conversation);

        let text = '';
        for await (const part of this.provider.stream(
            {
                messages: [{ id: 'compaction-request', timestamp: Date.now(), role: 'user', content: prompt }],
                tools: [],
                maxOutputTokens: this.options.maxSummaryTokens,
            },
            signal
        )) {
            if (part.type === 'text-delta') {
                text += part.delta;
            } else if (part.type === 'stream-error') {
                if (signal.aborted) throw abortReason(signal);
                this.logger.error(`Failed to generate compaction summary: ${part.error.message}`, {
                    code: part.error.code,
                });
                return createFallbackSummary(messages, currentTask);
            }
        }

        if (signal.aborted) throw abortReason(signal);

        if (text.trim() === '') {
            this.logger.warn('Compaction summary came back empty, using fallback summary');
            return createFallbackSummary(messages, currentTask);
        }

        return `${SUMMARY_HEADER}\n${text}`;
    }
}
