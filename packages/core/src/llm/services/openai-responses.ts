import OpenAI from 'openai';
import type { ResponseCreateParamsStreaming } from 'openai/resources/responses/responses';
import type { Logger } from '../../logger/types.js';
import { LogComponent } from '../../logger/types.js';
import type { LLMProvider, LLMStreamRequest, StreamPart } from '../types.js';
import { OpenAIResponsesMessageFormatter } from '../formatters/openai-responses.js';
import { adaptResponsesStream } from '../stream/responses.js';
import { toTransportError } from '../stream/transport-error.js';
import { openWithRetries } from './retry.js';
import type { OpenAIProviderOptions } from './openai-chat.js';

/**
 * The slice of the SDK this provider uses. Events are validated by the adapter,
 * so the stream is taken as unknown values.
 */
export interface ResponsesClient {
    create(
        params: ResponseCreateParamsStreaming,
        options: { signal: AbortSignal }
    ): Promise<AsyncIterable<unknown>>;
}

/**
 * Provider for the Responses API
 */
export class OpenAIResponsesProvider implements LLMProvider {
    readonly name = 'openai-responses';
    readonly model: string;
    private readonly responses: ResponsesClient;
    private readonly formatter = new OpenAIResponsesMessageFormatter();
    private readonly logger: Logger;

    constructor(
        private readonly options: OpenAIProviderOptions,
        logger: Logger,
        client?: ResponsesClient
    ) {
        this.model = options.model;
        this.logger = logger.createChild(LogComponent.LLM);
        this.responses =
            client ??
            new OpenAI({
                apiKey: options.apiKey,
                baseURL: options.baseURL,
                maxRetries: 0,
            }).responses;
    }

    async *stream(request: LLMStreamRequest, signal: AbortSignal): AsyncGenerator<StreamPart> {
        const maxOutputTokens = request.maxOutputTokens ?? this.options.maxOutputTokens;
        const params: ResponseCreateParamsStreaming = {
            model: this.model,
            input: this.formatter.format(request.messages),
            stream: true,
            store: false,
            ...(request.systemPrompt ? { instructions: request.systemPrompt } : {}),
            ...(request.tools.length > 0 && { tools: this.formatter.formatTools(request.tools) }),
            ...(maxOutputTokens !== undefined && { max_output_tokens: maxOutputTokens }),
            ...(this.options.temperature !== undefined && {
                temperature: this.options.temperature,
            }),
        };

        this.logger.debug(
            `Responses request: ${request.messages.length} messages, ${request.tools.length} tools`
        );

        let events: AsyncIterable<unknown>;
        try {
            events = await openWithRetries(() => this.responses.create(params, { signal }), {
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

        yield* adaptResponsesStream(events, { provider: this.name });
    }
}
