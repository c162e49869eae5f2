/**
 * Local storage error codes
 * Covers the installed-models document and on-disk model directories
 */
export enum StorageErrorCode {
    // Local models document (STO_001-009)
    /** The document could not be read for a reason other than absence */
    READ_FAILED = 'STO_001',
    /** The document is not valid JSON or fails validation */
    DOCUMENT_INVALID = 'STO_002',
    WRITE_FAILED = 'STO_003',

    // Model directories (STO_010-019)
    /** Deleting a model directory failed */
    REMOVE_FAILED = 'STO_010',

    // Lookups (STO_020-029)
    MODEL_NOT_FOUND = 'STO_020',
    /** An operation ran before `load()` completed */
    NOT_LOADED = 'STO_021',
}
