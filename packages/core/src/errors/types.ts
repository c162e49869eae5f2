import type { AcquisitionErrorCode } from '../acquisition/error-codes.js';
import type { CatalogErrorCode } from '../catalog/error-codes.js';
import type { ConfigErrorCode } from '../config/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { StorageErrorCode } from '../storage/error-codes.js';
import type { VaultEngineErrorCode } from '../vault/error-codes.js';

/**
 * Error scopes representing functional domains in the system
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CATALOG = 'catalog', // Bundled/override catalog parsing, merge and refresh
    LISTING = 'listing', // Remote file listing backends
    FETCH = 'fetch', // Streaming file transfers
    SESSION = 'session', // Download session lifecycle and worker control flow
    CONVERSION = 'conversion', // Post-download format conversion
    STORAGE = 'storage', // Local models config document and on-disk model directories
    CONFIG = 'config', // Engine configuration resolution and validation
    ENGINE = 'engine', // Facade lifecycle (init/shutdown ordering)
    LOGGER = 'logger', // Logging system operations, transports, and configuration
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 403 - permission denied, authentication required upstream
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist (model, file, etc.)
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, concurrent operation
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream host failures, malformed responses
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type VaultErrorCode =
    | AcquisitionErrorCode
    | CatalogErrorCode
    | ConfigErrorCode
    | LoggerErrorCode
    | StorageErrorCode
    | VaultEngineErrorCode;
