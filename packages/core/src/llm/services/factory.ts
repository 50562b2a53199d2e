import type { Logger } from '../../logger/types.js';
import type { LLMProvider } from '../types.js';
import { LLMConfigSchema, type LLMConfig } from '../schemas.js';
import { LLMError } from '../errors.js';
import { resolveApiKeyForProvider } from '../../utils/api-key-resolver.js';
import { OpenAIChatProvider, type OpenAIProviderOptions } from './openai-chat.js';
import { OpenAIResponsesProvider } from './openai-responses.js';
import { MockLLMProvider } from './mock.js';

/**
 * Create the provider named by the configuration.
 *
 * @throws StepwiseRuntimeError `llm_config_invalid` or `llm_api_key_missing`
 */
export function createLLMProvider(config: LLMConfig, logger: Logger): LLMProvider {
    const parsed = LLMConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw LLMError.invalidConfig(parsed.error.issues[0]?.message ?? 'invalid', {
            issues: parsed.error.issues,
        });
    }
    const validated = parsed.data;

    if (validated.provider === 'mock') {
        return new MockLLMProvider({
            scenario: validated.scenario,
            model: validated.model,
            retryDelaysMs: validated.retryDelaysMs,
            logger,
        });
    }

    const apiKey = validated.apiKey ?? resolveApiKeyForProvider(validated.provider);
    // Compatible local servers accept any key, so only require one for the default endpoint
    if (!apiKey && !validated.baseURL) {
        throw LLMError.apiKeyMissing(validated.provider);
    }

    const options: OpenAIProviderOptions = {
        model: validated.model,
        apiKey: apiKey ?? 'not-needed',
        baseURL: validated.baseURL,
        maxOutputTokens: validated.maxOutputTokens,
        temperature: validated.temperature,
        retryDelaysMs: validated.retryDelaysMs,
    };

    switch (validated.provider) {
        case 'openai-chat':
            return new OpenAIChatProvider(options, logger);
        case 'openai-responses':
            return new OpenAIResponsesProvider(options, logger);
    }
}
