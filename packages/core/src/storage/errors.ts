import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { StorageErrorCode } from './error-codes.js';

/**
 * Storage error factory with typed methods for the local models document
 * and model directories. Every error carries STORAGE scope.
 */
export class StorageError {
    static readFailed(filePath: string, reason: string) {
        return new VaultRuntimeError(
            StorageErrorCode.READ_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to read ${filePath}: ${reason}`,
            { filePath, reason }
        );
    }

    static documentInvalid(filePath: string, reason: string) {
        return new VaultRuntimeError(
            StorageErrorCode.DOCUMENT_INVALID,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Local models document ${filePath} is invalid: ${reason}`,
            { filePath, reason },
            'The document is rebuilt from the catalog and disk contents'
        );
    }

    static writeFailed(filePath: string, reason: string) {
        return new VaultRuntimeError(
            StorageErrorCode.WRITE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to write ${filePath}: ${reason}`,
            { filePath, reason },
            'Check permissions and free space in the data directory'
        );
    }

    static removeFailed(modelId: string, directory: string, reason: string) {
        return new VaultRuntimeError(
            StorageErrorCode.REMOVE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to remove ${modelId} from ${directory}: ${reason}`,
            { modelId, directory, reason }
        );
    }

    static modelNotFound(modelId: string) {
        return new VaultRuntimeError(
            StorageErrorCode.MODEL_NOT_FOUND,
            ErrorScope.STORAGE,
            ErrorType.NOT_FOUND,
            `Model '${modelId}' is not tracked in the local models document`,
            { modelId }
        );
    }

    static notLoaded(method: string) {
        return new VaultRuntimeError(
            StorageErrorCode.NOT_LOADED,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `LocalModelsStore is not loaded. Call load() before ${method}()`,
            { method }
        );
    }
}
