import { StepwiseRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LLMErrorCode } from './error-codes.js';

/**
 * LLM error factory with typed methods for creating provider and stream errors
 * Each method creates a properly typed StepwiseRuntimeError with LLM scope
 */
export class LLMError {
    /**
     * Provider transport broke (connection, HTTP status, aborted body)
     */
    static transportFailed(
        provider: string,
        reason: string,
        context?: { status?: number | undefined; attempts?: number | undefined }
    ) {
        return new StepwiseRuntimeError(
            LLMErrorCode.TRANSPORT_FAILED,
            ErrorScope.LLM,
            ErrorType.THIRD_PARTY,
            `Provider '${provider}' transport failed: ${reason}`,
            { provider, reason, ...context },
            'Retry the prompt; the conversation was left at its last consistent point'
        );
    }

    /**
     * Provider rejected the request with HTTP 429 after all retries
     */
    static rateLimited(provider: string, attempts: number) {
        return new StepwiseRuntimeError(
            LLMErrorCode.RATE_LIMITED,
            ErrorScope.LLM,
            ErrorType.RATE_LIMIT,
            `Provider '${provider}' is rate limiting requests`,
            { provider, attempts },
            'Wait before submitting another prompt'
        );
    }

    /**
     * Stream boundaries were violated (unterminated tool call, unknown id, duplicate start)
     */
    static malformedStream(reason: string, context?: Record<string, unknown>) {
        return new StepwiseRuntimeError(
            LLMErrorCode.MALFORMED_STREAM,
            ErrorScope.LLM,
            ErrorType.THIRD_PARTY,
            `Malformed provider stream: ${reason}`,
            { reason, ...context }
        );
    }

    static apiKeyMissing(provider: string) {
        return new StepwiseRuntimeError(
            LLMErrorCode.API_KEY_MISSING,
            ErrorScope.LLM,
            ErrorType.USER,
            `API key required for provider '${provider}'`,
            { provider },
            'Set apiKey in the LLM configuration or export OPENAI_API_KEY'
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>) {
        return new StepwiseRuntimeError(
            LLMErrorCode.CONFIG_INVALID,
            ErrorScope.LLM,
            ErrorType.USER,
            `Invalid LLM configuration: ${message}`,
            context
        );
    }

    /**
     * Scripted mock provider was called more times than it has responses
     */
    static mockScriptExhausted(calls: number) {
        return new StepwiseRuntimeError(
            LLMErrorCode.MOCK_SCRIPT_EXHAUSTED,
            ErrorScope.LLM,
            ErrorType.SYSTEM,
            `Mock provider has no scripted response for call ${calls}`,
            { calls }
        );
    }
}
