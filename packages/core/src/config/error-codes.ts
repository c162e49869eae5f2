/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    /** Resolved configuration failed schema validation */
    INVALID_CONFIG = 'config_invalid',
    /** An environment variable holds a value of the wrong shape */
    INVALID_ENV_VALUE = 'config_invalid_env_value',
}
