import type { StreamPart } from '../types.js';

/**
 * One scripted step of the mock provider: a part to yield, a pause, or a stall that
 * lasts until the request is aborted.
 */
export type MockStep = StreamPart | { type: 'delay'; ms: number } | { type: 'hang' };

export const MOCK_SCENARIOS = [
    'default',
    'simple_text',
    'thinking_text_tool',
    'stream_error',
    'unknown_tool',
    'long_text',
    'tool_hang',
    'tool_with_many_chunks',
    'retries',
    'retry_exhausted',
    'non_retryable',
] as const;

export type MockScenario = (typeof MOCK_SCENARIOS)[number];

const MOCK_USAGE = { inputTokens: 10, outputTokens: 5, cachedInputTokens: 2 };

function toolCall(id: string, name: string, args: string): StreamPart[] {
    return [
        { type: 'tool-call-start', toolCallId: id, toolName: name },
        { type: 'tool-call-delta', toolCallId: id, delta: args },
        { type: 'tool-call-end', toolCallId: id },
    ];
}

const defaultScript = (): MockStep[] => [
    { type: 'thinking-delta', delta: 'Let me think about this...' },
    { type: 'text-delta', delta: "I'll help you with that." },
    ...toolCall('call-1', 'read_file', '{"file_path": "file.txt"}'),
    ...toolCall('call-2', 'bash_exec', '{"command": "ls -la"}'),
    { type: 'stream-done', finishReason: 'tool-calls', usage: MOCK_USAGE },
];

const simpleText = (): MockStep[] => [
    { type: 'text-delta', delta: 'Hello, world!' },
    { type: 'stream-done', finishReason: 'stop', usage: MOCK_USAGE },
];

/**
 * Scripts per scenario, keyed by scenario name. Scenarios that fail while opening
 * the connection (`retries`, `retry_exhausted`, `non_retryable`) answer with
 * `simple_text` once they succeed.
 */
export const MOCK_SCENARIO_SCRIPTS: Record<MockScenario, () => MockStep[]> = {
    default: defaultScript,
    simple_text: simpleText,
    thinking_text_tool: () => [
        { type: 'thinking-delta', delta: 'I need to read the file' },
        { type: 'text-delta', delta: 'Let me check the file.' },
        ...toolCall('call-1', 'read_file', '{"file_path": "test.txt"}'),
        { type: 'stream-done', finishReason: 'tool-calls', usage: MOCK_USAGE },
    ],
    stream_error: () => [{ type: 'text-delta', delta: 'Before error' }],
    unknown_tool: () => [
        ...toolCall('call-1', 'unknown_tool', '{"arg": "value"}'),
        { type: 'stream-done', finishReason: 'tool-calls', usage: MOCK_USAGE },
    ],
    long_text: () => [
        ...['This ', 'is ', 'a ', 'long ', 'response', '.'].map(
            (delta): MockStep => ({ type: 'text-delta', delta })
        ),
        { type: 'stream-done', finishReason: 'stop', usage: MOCK_USAGE },
    ],
    tool_hang: () => [
        { type: 'tool-call-start', toolCallId: 'call-1', toolName: 'read_file' },
        { type: 'tool-call-delta', toolCallId: 'call-1', delta: '{"file_path": "test.txt"}' },
        { type: 'hang' },
    ],
    // 24 fragments of 8 characters: 2 estimated tokens each
    tool_with_many_chunks: () => [
        { type: 'tool-call-start', toolCallId: 'call-1', toolName: 'bash_exec' },
        ...'abcdefghijklmnopqrstuvwx'.split('').map(
            (letter): MockStep => ({
                type: 'tool-call-delta',
                toolCallId: 'call-1',
                delta: letter.repeat(8),
            })
        ),
        { type: 'tool-call-end', toolCallId: 'call-1' },
        { type: 'stream-done', finishReason: 'tool-calls', usage: MOCK_USAGE },
    ],
    retries: simpleText,
    retry_exhausted: simpleText,
    non_retryable: simpleText,
};
