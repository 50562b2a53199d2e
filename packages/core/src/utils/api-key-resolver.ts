/**
 * Utility for resolving provider API keys from environment variables.
 */

const API_KEY_ENV_VARS: Record<string, string[]> = {
    'openai-chat': ['OPENAI_API_KEY', 'OPENAI_KEY'],
    'openai-responses': ['OPENAI_API_KEY', 'OPENAI_KEY'],
};

export function getApiKeyEnvVarsForProvider(provider: string): string[] {
    return API_KEY_ENV_VARS[provider] ?? [];
}

/**
 * Resolves the API key for a provider from environment variables.
 *
 * @returns The first non-empty value, or undefined
 */
export function resolveApiKeyForProvider(
    provider: string,
    env: NodeJS.ProcessEnv = process.env
): string | undefined {
    for (const name of getApiKeyEnvVarsForProvider(provider)) {
        const value = env[name];
        if (value && value.trim() !== '') {
            return value.trim();
        }
    }
    return undefined;
}
