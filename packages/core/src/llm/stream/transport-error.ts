import { isRuntimeError, type StepwiseRuntimeError } from '../../errors/runtime-error.js';
import { LLMError } from '../errors.js';

/**
 * HTTP status carried by an SDK error, if any
 */
export function getHttpStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error) {
        return typeof error.status === 'number' ? error.status : undefined;
    }
    return undefined;
}

/**
 * Map anything thrown by a transport to an `llm_transport_failed` error
 */
export function toTransportError(provider: string, error: unknown): StepwiseRuntimeError {
    if (isRuntimeError(error)) return error;
    const reason = error instanceof Error ? error.message : String(error);
    return LLMError.transportFailed(provider, reason, { status: getHttpStatus(error) });
}
