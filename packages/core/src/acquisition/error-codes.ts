/**
 * Error codes for model acquisition (listing, transfer, session control, conversion)
 */
export enum AcquisitionErrorCode {
    // Network (ACQ_001-009)
    /** Connection failed or the stream broke mid-transfer */
    NETWORK_FAILED = 'ACQ_001',
    /** Upstream answered with a non-success status */
    HTTP_STATUS = 'ACQ_002',
    /** Upstream requires a token (401/403) */
    AUTH_REQUIRED = 'ACQ_003',
    /** Request exceeded its absolute timeout */
    TIMEOUT = 'ACQ_004',

    // Format (ACQ_010-019)
    /** Listing body is not the expected JSON shape */
    MALFORMED_RESPONSE = 'ACQ_010',
    /** Candidate URL does not identify a repository */
    INVALID_REPOSITORY_URL = 'ACQ_011',
    /** Listing succeeded but contained no files */
    EMPTY_LISTING = 'ACQ_012',
    /** Remote path would escape the destination directory */
    UNSAFE_PATH = 'ACQ_013',

    // Filesystem (ACQ_020-029)
    FILESYSTEM = 'ACQ_020',

    // Control flow (ACQ_030-039)
    /** User cancelled the session */
    CANCELLED = 'ACQ_030',
    /** Manual-only source used with the automatic path */
    UNSUPPORTED_SOURCE = 'ACQ_031',
    /** Session reset while its worker is still running */
    SESSION_ACTIVE = 'ACQ_032',

    // Conversion (ACQ_040-049)
    CONVERSION_FAILED = 'ACQ_040',
    UNKNOWN_CONVERTER = 'ACQ_041',
}
