/**
 * Logger-specific error codes
 */
export enum LoggerErrorCode {
    // Transport errors
    TRANSPORT_UNKNOWN_TYPE = 'logger_transport_unknown_type',
    TRANSPORT_INITIALIZATION_FAILED = 'logger_transport_initialization_failed',

    // Configuration errors
    INVALID_LOG_LEVEL = 'logger_invalid_log_level',
}
