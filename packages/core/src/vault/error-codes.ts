/**
 * Engine facade error codes
 */
export enum VaultEngineErrorCode {
    NOT_STARTED = 'ENG_001',
    ALREADY_STARTED = 'ENG_002',
    STOPPED = 'ENG_003',
}
