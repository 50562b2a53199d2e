export { createLLMProvider } from './factory.js';
export { OpenAIChatProvider } from './openai-chat.js';
export type { ChatCompletionsClient, OpenAIProviderOptions } from './openai-chat.js';
export { OpenAIResponsesProvider } from './openai-responses.js';
export type { ResponsesClient } from './openai-responses.js';
export { MockLLMProvider, MockHTTPError } from './mock.js';
export type { MockLLMProviderOptions, MockResponse } from './mock.js';
export { MOCK_SCENARIOS, MOCK_SCENARIO_SCRIPTS } from './mock-scenarios.js';
export type { MockScenario, MockStep } from './mock-scenarios.js';
export { openWithRetries, isRetryableStatus } from './retry.js';
export type { RetryOptions } from './retry.js';
