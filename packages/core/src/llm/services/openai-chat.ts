import OpenAI from 'openai';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources';
import type { Logger } from '../../logger/types.js';
import { LogComponent } from '../../logger/types.js';
import type { LLMProvider, LLMStreamRequest, StreamPart } from '../types.js';
import { OpenAIChatMessageFormatter } from '../formatters/openai-chat.js';
import { adaptChatCompletionStream } from '../stream/chat-completions.js';
import { toTransportError } from '../stream/transport-error.js';
import { openWithRetries } from './retry.js';

/**
 * The slice of the SDK this provider uses; tests substitute an in-process fake
 */
export interface ChatCompletionsClient {
    create(
        params: ChatCompletionCreateParamsStreaming,
        options: { signal: AbortSignal }
    ): Promise<AsyncIterable<ChatCompletionChunk>>;
}

export interface OpenAIProviderOptions {
    model: string;
    apiKey?: string | undefined;
    baseURL?: string | undefined;
    maxOutputTokens?: number | undefined;
    temperature?: number | undefined;
    retryDelaysMs: readonly number[];
}

/**
 * Provider for Chat Completions endpoints (OpenAI and compatible servers)
 */
export class OpenAIChatProvider implements LLMProvider {
    readonly name = 'openai-chat';
    readonly model: string;
    private readonly completions: ChatCompletionsClient;
    private readonly formatter = new OpenAIChatMessageFormatter();
    private readonly logger: Logger;

    constructor(
        private readonly options: OpenAIProviderOptions,
        logger: Logger,
        client?: ChatCompletionsClient
    ) {
        this.model = options.model;
        this.logger = logger.createChild(LogComponent.LLM);
        // SDK retries are disabled; openWithRetries owns the retry policy
        this.completions =
            client ??
            new OpenAI({
                apiKey: options.apiKey,
                baseURL: options.baseURL,
                maxRetries: 0,
            }).chat.completions;
    }

    async *stream(request: LLMStreamRequest, signal: AbortSignal): AsyncGenerator<StreamPart> {
        const maxOutputTokens = request.maxOutputTokens ?? this.options.maxOutputTokens;
        const params: ChatCompletionCreateParamsStreaming = {
            model: this.model,
            messages: this.formatter.format(request.messages, request.systemPrompt),
            stream: true,
            stream_options: { include_usage: true },
            ...(request.tools.length > 0 && { tools: this.formatter.formatTools(request.tools) }),
            ...(maxOutputTokens !== undefined && { max_completion_tokens: maxOutputTokens }),
            ...(this.options.temperature !== undefined && {
                temperature: this.options.temperature,
            }),
        };

        this.logger.debug(
            `Chat completion request: ${params.messages.length} messages, ${request.tools.length} tools`
        );

        let chunks: AsyncIterable<ChatCompletionChunk>;
        try {
            chunks = await openWithRetries(() => this.completions.create(params, { signal }), {
                provider: this.name,
                delaysMs: this.options.retryDelaysMs,
                signal,
                onRetry: request.onRetry,
                logger: this.logger,
            });
        } catch (error) {
            yield { type: 'stream-error', error: toTransportError(this.name, error) };
            return;
        }

        yield* adaptChatCompletionStream(chunks, { provider: this.name });
    }
}
