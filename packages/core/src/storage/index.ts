export { LocalModelsStore } from './local-models-store.js';
export type { LocalModelsStoreOptions } from './local-models-store.js';
export {
    LOCAL_MODELS_VERSION,
    LocalModelSchema,
    LocalModelsDocumentSchema,
    ModelStatusSchema,
    ModelStatusStateSchema,
} from './schemas.js';
export type { LocalModel, LocalModelsDocument, ModelStatus, ModelStatusState } from './schemas.js';
export { StorageError } from './errors.js';
export { StorageErrorCode } from './error-codes.js';
