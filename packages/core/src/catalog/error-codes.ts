/**
 * Catalog error codes
 */
export enum CatalogErrorCode {
    // Bundled catalog (CAT_001-009)
    /** The catalog shipped with the package failed to parse */
    BUNDLED_INVALID = 'CAT_001',

    // Override document (CAT_010-019)
    /** The user override document is not valid JSON or fails validation */
    OVERRIDE_INVALID = 'CAT_010',
    /** The override document could not be written */
    OVERRIDE_WRITE_FAILED = 'CAT_011',

    // Remote refresh (CAT_020-029)
    /** Remote catalog request failed or returned a non-success status */
    REFRESH_FAILED = 'CAT_020',
    /** Remote catalog body is not a valid catalog */
    REFRESH_INVALID = 'CAT_021',

    // Queries (CAT_030-039)
    MODEL_NOT_FOUND = 'CAT_030',
    /** A query ran before `load()` completed */
    NOT_LOADED = 'CAT_031',
}
