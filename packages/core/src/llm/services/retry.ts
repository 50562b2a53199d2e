import type { Logger } from '../../logger/types.js';
import type { RetryInfo } from '../types.js';
import { LLMError } from '../errors.js';
import { getHttpStatus, toTransportError } from '../stream/transport-error.js';
import { sleep } from '../../utils/abort.js';
import { isRuntimeError } from '../../errors/runtime-error.js';

export interface RetryOptions {
    provider: string;
    /** One wait per retry; the call is attempted `delaysMs.length + 1` times */
    delaysMs: readonly number[];
    signal: AbortSignal;
    onRetry?: ((info: RetryInfo) => void) | undefined;
    logger: Logger;
}

/**
 * HTTP 429 and server errors are worth another attempt; everything else fails fast.
 */
export function isRetryableStatus(status: number | undefined): boolean {
    return status !== undefined && (status === 429 || status >= 500);
}

/**
 * Open a provider connection, retrying retryable failures with fixed delays.
 *
 * Only opening the stream is retried. Once parts flow, a failure ends the turn and
 * retrying the prompt is the caller's decision.
 *
 * @throws StepwiseRuntimeError `llm_rate_limited` or `llm_transport_failed`
 */
export async function openWithRetries<T>(open: () => Promise<T>, options: RetryOptions): Promise<T> {
    const { provider, delaysMs, signal, onRetry, logger } = options;
    const totalAttempts = delaysMs.length + 1;

    for (let attempt = 1; ; attempt++) {
        try {
            return await open();
        } catch (error) {
            if (signal.aborted) {
                throw toTransportError(provider, error);
            }

            const status = getHttpStatus(error);
            const delayMs = delaysMs[attempt - 1];
            const runtimeError = isRuntimeError(error)
                ? error
                : status === 429
                  ? LLMError.rateLimited(provider, attempt)
                  : LLMError.transportFailed(
                        provider,
                        error instanceof Error ? error.message : String(error),
                        { status, attempts: attempt }
                    );

            if (!isRetryableStatus(status) || delayMs === undefined) {
                throw runtimeError;
            }

            logger.warn(
                `${provider} request failed (attempt ${attempt}/${totalAttempts}), retrying in ${delayMs}ms: ${runtimeError.message}`,
                { status }
            );
            onRetry?.({ attempt, totalAttempts, delayMs, error: runtimeError });
            await sleep(delayMs, signal);
        }
    }
}
