// Types
export type {
    Catalog,
    ModelEntry,
    ModelCategory,
    ModelSource,
    SourceKind,
    ConversionSpec,
    AutomaticSource,
    ManualSource,
} from './types.js';

// Schemas
export {
    CatalogSchema,
    ModelEntrySchema,
    SourceSchema,
    ModelCategorySchema,
    ConversionSchema,
} from './schemas.js';
export type { CatalogInput, ModelEntryInput } from './schemas.js';

// Store
export { CatalogStore, mergeCatalogs } from './store.js';
export type { CatalogStoreOptions } from './store.js';

// Errors
export { CatalogError } from './errors.js';
export { CatalogErrorCode } from './error-codes.js';
