/**
 * Logger-specific error codes
 */
export enum LoggerErrorCode {
    TRANSPORT_UNKNOWN_TYPE = 'logger_transport_unknown_type',
    INVALID_CONFIG = 'logger_invalid_config',
}
