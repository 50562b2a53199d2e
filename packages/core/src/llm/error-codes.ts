/**
 * LLM-specific error codes
 * Covers provider transports and stream integrity
 */
export enum LLMErrorCode {
    // Transport
    TRANSPORT_FAILED = 'llm_transport_failed',
    RATE_LIMITED = 'llm_rate_limited',

    // Stream integrity
    MALFORMED_STREAM = 'llm_malformed_stream',

    // Configuration
    API_KEY_MISSING = 'llm_api_key_missing',
    CONFIG_INVALID = 'llm_config_invalid',
    MOCK_SCRIPT_EXHAUSTED = 'llm_mock_script_exhausted',
}
