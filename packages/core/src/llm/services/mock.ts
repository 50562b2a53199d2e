import type { Logger } from '../../logger/types.js';
import type { LLMProvider, LLMStreamRequest, StreamPart } from '../types.js';
import { LLMError } from '../errors.js';
import { openWithRetries } from './retry.js';
import { toTransportError } from '../stream/transport-error.js';
import { sleep } from '../../utils/abort.js';
import { MOCK_SCENARIO_SCRIPTS, type MockScenario, type MockStep } from './mock-scenarios.js';

/**
 * Scripted reply: a fixed list of steps, or a function of the request and the
 * zero-based call number.
 */
export type MockResponse =
    | readonly MockStep[]
    | ((request: LLMStreamRequest, call: number) => readonly MockStep[]);

export interface MockLLMProviderOptions {
    scenario?: MockScenario | undefined;
    /** One response per call, in order. Takes precedence over `scenario`. */
    responses?: readonly MockResponse[] | undefined;
    model?: string | undefined;
    retryDelaysMs?: readonly number[] | undefined;
    logger: Logger;
}

/**
 * Error with an HTTP status, as thrown by real SDKs when opening a connection fails
 */
export class MockHTTPError extends Error {
    constructor(
        message: string,
        readonly status: number
    ) {
        super(message);
        this.name = 'MockHTTPError';
    }
}

/**
 * Provider that replays scripted parts without any network access.
 *
 * Scenario `stream_error` ends with a transport error after its text; `tool_hang`
 * stops producing parts until the request is aborted.
 */
export class MockLLMProvider implements LLMProvider {
    readonly name = 'mock';
    readonly model: string;
    /** Every request received, in call order */
    readonly requests: LLMStreamRequest[] = [];

    private readonly scenario: MockScenario;
    private readonly responses: readonly MockResponse[] | undefined;
    private readonly retryDelaysMs: readonly number[];
    private readonly logger: Logger;
    private calls = 0;
    private connectionAttempts = 0;

    constructor(options: MockLLMProviderOptions) {
        this.scenario = options.scenario ?? 'default';
        this.responses = options.responses;
        this.model = options.model ?? 'mock-model';
        this.retryDelaysMs = options.retryDelaysMs ?? [];
        this.logger = options.logger;
    }

    get callCount(): number {
        return this.calls;
    }

    async *stream(request: LLMStreamRequest, signal: AbortSignal): AsyncGenerator<StreamPart> {
        this.requests.push(request);
        const call = this.calls++;

        let steps: readonly MockStep[];
        try {
            steps = await openWithRetries(async () => this.open(request, call), {
                provider: this.name,
                delaysMs: this.retryDelaysMs,
                signal,
                onRetry: request.onRetry,
                logger: this.logger,
            });
        } catch (error) {
            yield { type: 'stream-error', error: toTransportError(this.name, error) };
            return;
        }

        for (const step of steps) {
            if (signal.aborted) return;

            if (step.type === 'delay') {
                try {
                    await sleep(step.ms, signal);
                } catch {
                    // aborted
                    return;
                }
                continue;
            }

            if (step.type === 'hang') {
                await new Promise<void>((resolve) => {
                    if (signal.aborted) resolve();
                    signal.addEventListener('abort', () => resolve(), { once: true });
                });
                return;
            }

            yield step;
            if (step.type === 'stream-done' || step.type === 'stream-error') return;
        }

        if (this.responses === undefined && this.scenario === 'stream_error') {
            yield {
                type: 'stream-error',
                error: LLMError.transportFailed(this.name, 'Something went wrong'),
            };
        }
    }

    private open(request: LLMStreamRequest, call: number): readonly MockStep[] {
        this.connectionAttempts++;

        if (this.responses !== undefined) {
            const response = this.responses[call];
            if (response === undefined) {
                throw LLMError.mockScriptExhausted(call + 1);
            }
            return typeof response === 'function' ? response(request, call) : response;
        }

        switch (this.scenario) {
            case 'retries':
                if (this.connectionAttempts < 3) {
                    throw new MockHTTPError('Rate limit', 429);
                }
                break;
            case 'retry_exhausted':
                throw new MockHTTPError('Service unavailable', 503);
            case 'non_retryable':
                throw new MockHTTPError('Invalid input', 400);
            default:
                break;
        }

        return MOCK_SCENARIO_SCRIPTS[this.scenario]();
    }
}
