import { z } from 'zod';
import type { FinishReason, StreamPart, TokenUsage } from '../types.js';
import { LLMError } from '../errors.js';
import { toTransportError } from './transport-error.js';

const EnvelopeSchema = z.object({ type: z.string() }).passthrough();

const UsageSchema = z
    .object({
        input_tokens: z.number(),
        output_tokens: z.number(),
        input_tokens_details: z
            .object({ cached_tokens: z.number().optional() })
            .passthrough()
            .nullish(),
    })
    .passthrough();

const FunctionCallItemSchema = z
    .object({
        type: z.literal('function_call'),
        id: z.string().optional(),
        call_id: z.string(),
        name: z.string(),
        arguments: z.string().optional(),
    })
    .passthrough();

const OutputItemAddedSchema = z
    .object({
        type: z.literal('response.output_item.added'),
        output_index: z.number(),
        item: z.object({ type: z.string() }).passthrough(),
    })
    .passthrough();

const OutputItemDoneSchema = z
    .object({
        type: z.literal('response.output_item.done'),
        output_index: z.number(),
        item: z.object({ type: z.string(), id: z.string().optional() }).passthrough(),
    })
    .passthrough();

const ArgumentsDeltaSchema = z
    .object({
        type: z.literal('response.function_call_arguments.delta'),
        item_id: z.string(),
        output_index: z.number(),
        delta: z.string(),
    })
    .passthrough();

const TextDeltaSchema = z
    .object({
        type: z.enum(['response.output_text.delta', 'response.reasoning_summary_text.delta']),
        delta: z.string(),
    })
    .passthrough();

const ResponseFinishedSchema = z
    .object({
        type: z.enum(['response.completed', 'response.incomplete']),
        response: z
            .object({
                usage: UsageSchema.nullish(),
                incomplete_details: z.object({ reason: z.string().optional() }).passthrough().nullish(),
            })
            .passthrough(),
    })
    .passthrough();

const ResponseFailedSchema = z
    .object({
        type: z.literal('response.failed'),
        response: z
            .object({
                error: z
                    .object({ code: z.string().optional(), message: z.string() })
                    .passthrough()
                    .nullish(),
            })
            .passthrough(),
    })
    .passthrough();

const ErrorEventSchema = z
    .object({
        type: z.literal('error'),
        message: z.string(),
        code: z.string().nullish(),
    })
    .passthrough();

export interface ResponsesStreamOptions {
    provider?: string | undefined;
}

interface OpenCall {
    callId: string;
    outputIndex: number;
}

function mapUsage(usage: z.output<typeof UsageSchema>): TokenUsage {
    return {
        inputTokens: usage.input_tokens,
        outputTokens: usage.output_tokens,
        cachedInputTokens: usage.input_tokens_details?.cached_tokens ?? 0,
    };
}

/**
 * Normalize a responses-style event stream into stream parts.
 *
 * Each event is validated on its own; event types that carry nothing for the turn
 * are skipped. Function calls start at `output_item.added`, collect argument deltas
 * by item id and end at `output_item.done`. A call that never reaches `done` stays
 * open, which the Turn Engine treats as a malformed turn.
 */
export async function* adaptResponsesStream(
    events: AsyncIterable<unknown>,
    options: ResponsesStreamOptions = {}
): AsyncGenerator<StreamPart, void, undefined> {
    const provider = options.provider ?? 'openai-responses';
    // Keyed by item id, falling back to the output index when the item has no id
    const openCalls = new Map<string, OpenCall>();
    let sawFunctionCall = false;

    const malformed = (type: string, error: z.ZodError): StreamPart => ({
        type: 'stream-error',
        error: LLMError.malformedStream(`unexpected shape for '${type}' event`, {
            issues: error.issues.map((issue) => issue.message),
        }),
    });

    const findByOutputIndex = (outputIndex: number): [string, OpenCall] | undefined =>
        [...openCalls.entries()].find(([, call]) => call.outputIndex === outputIndex);

    const takeCall = (itemId: string | undefined, outputIndex: number): OpenCall | undefined => {
        const key =
            itemId !== undefined && openCalls.has(itemId)
                ? itemId
                : findByOutputIndex(outputIndex)?.[0];
        if (key === undefined) return undefined;
        const call = openCalls.get(key);
        openCalls.delete(key);
        return call;
    };

    try {
        for await (const raw of events) {
            const envelope = EnvelopeSchema.safeParse(raw);
            if (!envelope.success) {
                yield malformed('unknown', envelope.error);
                return;
            }

            switch (envelope.data.type) {
                case 'response.output_item.added': {
                    const event = OutputItemAddedSchema.safeParse(raw);
                    if (!event.success) {
                        yield malformed(envelope.data.type, event.error);
                        return;
                    }
                    if (event.data.item.type !== 'function_call') break;
                    const item = FunctionCallItemSchema.safeParse(event.data.item);
                    if (!item.success) {
                        yield malformed(envelope.data.type, item.error);
                        return;
                    }
                    const key = item.data.id ?? `output_${event.data.output_index}`;
                    openCalls.set(key, {
                        callId: item.data.call_id,
                        outputIndex: event.data.output_index,
                    });
                    sawFunctionCall = true;
                    yield {
                        type: 'tool-call-start',
                        toolCallId: item.data.call_id,
                        toolName: item.data.name,
                    };
                    if (item.data.arguments) {
                        yield {
                            type: 'tool-call-delta',
                            toolCallId: item.data.call_id,
                            delta: item.data.arguments,
                        };
                    }
                    break;
                }

                case 'response.function_call_arguments.delta': {
                    const event = ArgumentsDeltaSchema.safeParse(raw);
                    if (!event.success) {
                        yield malformed(envelope.data.type, event.error);
                        return;
                    }
                    const call =
                        openCalls.get(event.data.item_id) ??
                        findByOutputIndex(event.data.output_index)?.[1];
                    // Unknown item ids pass through so the Turn Engine can reject them
                    yield {
                        type: 'tool-call-delta',
                        toolCallId: call?.callId ?? event.data.item_id,
                        delta: event.data.delta,
                    };
                    break;
                }

                case 'response.output_item.done': {
                    const event = OutputItemDoneSchema.safeParse(raw);
                    if (!event.success) {
                        yield malformed(envelope.data.type, event.error);
                        return;
                    }
                    if (event.data.item.type !== 'function_call') break;
                    const call = takeCall(event.data.item.id, event.data.output_index);
                    if (!call) break;
                    yield { type: 'tool-call-end', toolCallId: call.callId };
                    break;
                }

                case 'response.output_text.delta':
                case 'response.reasoning_summary_text.delta': {
                    const event = TextDeltaSchema.safeParse(raw);
                    if (!event.success) {
                        yield malformed(envelope.data.type, event.error);
                        return;
                    }
                    if (event.data.delta === '') break;
                    yield event.data.type === 'response.output_text.delta'
                        ? { type: 'text-delta', delta: event.data.delta }
                        : {
                              type: 'thinking-delta',
                              delta: event.data.delta,
                              signature: 'reasoning_summary',
                          };
                    break;
                }

                case 'response.completed':
                case 'response.incomplete': {
                    const event = ResponseFinishedSchema.safeParse(raw);
                    if (!event.success) {
                        yield malformed(envelope.data.type, event.error);
                        return;
                    }
                    let finishReason: FinishReason;
                    if (event.data.type === 'response.incomplete') {
                        finishReason =
                            event.data.response.incomplete_details?.reason === 'max_output_tokens'
                                ? 'length'
                                : 'other';
                    } else {
                        finishReason = sawFunctionCall ? 'tool-calls' : 'stop';
                    }
                    const usage = event.data.response.usage;
                    yield {
                        type: 'stream-done',
                        finishReason,
                        ...(usage && { usage: mapUsage(usage) }),
                    };
                    return;
                }

                case 'response.failed': {
                    const event = ResponseFailedSchema.safeParse(raw);
                    const message =
                        (event.success && event.data.response.error?.message) ||
                        'response failed';
                    yield {
                        type: 'stream-error',
                        error: LLMError.transportFailed(provider, message),
                    };
                    return;
                }

                case 'error': {
                    const event = ErrorEventSchema.safeParse(raw);
                    const message = event.success ? event.data.message : 'stream error event';
                    yield {
                        type: 'stream-error',
                        error: LLMError.transportFailed(provider, message),
                    };
                    return;
                }

                default:
                    // Lifecycle and annotation events carry nothing for the turn
                    break;
            }
        }
    } catch (error) {
        yield { type: 'stream-error', error: toTransportError(provider, error) };
        return;
    }

    yield {
        type: 'stream-error',
        error: LLMError.malformedStream('stream ended before the response completed'),
    };
}
