import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { CatalogErrorCode } from './error-codes.js';

const SCOPE = ErrorScope.CATALOG;

/**
 * Catalog error factory
 */
export class CatalogError {
    static bundledInvalid(filePath: string, reason: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.BUNDLED_INVALID,
            SCOPE,
            ErrorType.SYSTEM,
            `Bundled catalog at ${filePath} is invalid: ${reason}`,
            { filePath, reason },
            'Reinstall the package; the shipped catalog is corrupted'
        );
    }

    static overrideInvalid(filePath: string, reason: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.OVERRIDE_INVALID,
            SCOPE,
            ErrorType.USER,
            `Catalog override at ${filePath} is invalid: ${reason}`,
            { filePath, reason },
            `Fix or delete ${filePath}; bundled defaults are used meanwhile`
        );
    }

    static overrideWriteFailed(filePath: string, reason: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.OVERRIDE_WRITE_FAILED,
            SCOPE,
            ErrorType.SYSTEM,
            `Failed to write catalog override ${filePath}: ${reason}`,
            { filePath, reason },
            'Check permissions and free space in the data directory'
        );
    }

    static refreshFailed(url: string, reason: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.REFRESH_FAILED,
            SCOPE,
            ErrorType.THIRD_PARTY,
            `Catalog refresh from ${url} failed: ${reason}`,
            { url, reason }
        );
    }

    static refreshInvalid(url: string, reason: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.REFRESH_INVALID,
            SCOPE,
            ErrorType.THIRD_PARTY,
            `Catalog from ${url} is invalid: ${reason}`,
            { url, reason }
        );
    }

    static modelNotFound(modelId: string) {
        return new VaultRuntimeError(
            CatalogErrorCode.MODEL_NOT_FOUND,
            SCOPE,
            ErrorType.NOT_FOUND,
            `Model '${modelId}' is not in the catalog`,
            { modelId },
            'Run `modelvault models list` to see available ids'
        );
    }

    static notLoaded() {
        return new VaultRuntimeError(
            CatalogErrorCode.NOT_LOADED,
            SCOPE,
            ErrorType.SYSTEM,
            'Catalog queried before it was loaded',
            {},
            'Await CatalogStore.load() before querying'
        );
    }
}
