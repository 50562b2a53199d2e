export {
    adaptChatCompletionStream,
    mapChatFinishReason,
    mapChatUsage,
    CHAT_REASONING_FIELDS,
} from './chat-completions.js';
export type { ChatStreamOptions } from './chat-completions.js';
export { adaptResponsesStream } from './responses.js';
export type { ResponsesStreamOptions } from './responses.js';
export { getHttpStatus, toTransportError } from './transport-error.js';
