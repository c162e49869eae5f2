import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { AcquisitionErrorCode } from './error-codes.js';

type TransferScope = ErrorScope.LISTING | ErrorScope.FETCH;

/**
 * Acquisition error factory. Messages are shown verbatim in the model detail
 * panel, so each one names the URL or path involved.
 */
export const AcquisitionError = {
    network(url: string, reason: string, scope: TransferScope = ErrorScope.FETCH): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.NETWORK_FAILED,
            scope,
            ErrorType.THIRD_PARTY,
            `Network error for ${url}: ${reason}`,
            { url, reason },
            'Check your connection; backup URLs are tried automatically'
        );
    },

    httpStatus(
        url: string,
        status: number,
        statusText: string,
        scope: TransferScope = ErrorScope.FETCH
    ): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.HTTP_STATUS,
            scope,
            status === 404 ? ErrorType.NOT_FOUND : ErrorType.THIRD_PARTY,
            `HTTP ${status}${statusText ? ` ${statusText}` : ''} from ${url}`,
            { url, status, statusText }
        );
    },

    authRequired(url: string, status: number, scope: TransferScope = ErrorScope.FETCH): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.AUTH_REQUIRED,
            scope,
            ErrorType.FORBIDDEN,
            `Access denied (HTTP ${status}) for ${url}: the model host requires authentication`,
            { url, status },
            [
                'Set HF_TOKEN to an access token with read permission',
                'Or save the token to ~/.cache/huggingface/token',
                'Accept the model license on the host if it is gated',
            ]
        );
    },

    timeout(url: string, timeoutMs: number, scope: TransferScope = ErrorScope.FETCH): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.TIMEOUT,
            scope,
            ErrorType.TIMEOUT,
            `Request to ${url} timed out after ${Math.round(timeoutMs / 1000)}s`,
            { url, timeoutMs }
        );
    },

    malformedResponse(url: string, reason: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.MALFORMED_RESPONSE,
            ErrorScope.LISTING,
            ErrorType.THIRD_PARTY,
            `Unexpected listing response from ${url}: ${reason}`,
            { url, reason }
        );
    },

    invalidRepositoryUrl(url: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.INVALID_REPOSITORY_URL,
            ErrorScope.LISTING,
            ErrorType.USER,
            `Invalid repository URL: ${url}`,
            { url },
            'Repository URLs look like https://host/{organization}/{repository}'
        );
    },

    emptyListing(url: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.EMPTY_LISTING,
            ErrorScope.LISTING,
            ErrorType.NOT_FOUND,
            `No files in repository ${url}`,
            { url }
        );
    },

    unsafePath(remotePath: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.UNSAFE_PATH,
            ErrorScope.LISTING,
            ErrorType.THIRD_PARTY,
            `Remote file path escapes the model directory: ${remotePath}`,
            { remotePath }
        );
    },

    filesystem(filePath: string, reason: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.FILESYSTEM,
            ErrorScope.FETCH,
            ErrorType.SYSTEM,
            `Cannot write ${filePath}: ${reason}`,
            { filePath, reason },
            'Check permissions and free disk space'
        );
    },

    cancelled(modelId: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.CANCELLED,
            ErrorScope.SESSION,
            ErrorType.USER,
            `Download of ${modelId} cancelled`,
            { modelId }
        );
    },

    unsupportedSource(modelId: string, instructions?: string, homepage?: string): VaultRuntimeError {
        const details = [instructions, homepage ? `See ${homepage}` : undefined]
            .filter((part): part is string => Boolean(part))
            .join(' ');
        return new VaultRuntimeError(
            AcquisitionErrorCode.UNSUPPORTED_SOURCE,
            ErrorScope.SESSION,
            ErrorType.USER,
            'This model requires manual installation.' +
                (details ? ` ${details}` : ' See the model description for instructions.'),
            { modelId, instructions, homepage }
        );
    },

    sessionActive(modelId: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.SESSION_ACTIVE,
            ErrorScope.SESSION,
            ErrorType.CONFLICT,
            `Download of ${modelId} is still running`,
            { modelId },
            'Cancel the session and wait for it to stop before retrying'
        );
    },

    conversionFailed(modelId: string, converter: string, reason: string): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.CONVERSION_FAILED,
            ErrorScope.CONVERSION,
            ErrorType.SYSTEM,
            `Conversion '${converter}' failed for ${modelId}: ${reason}`,
            { modelId, converter, reason }
        );
    },

    unknownConverter(converter: string, available: string[]): VaultRuntimeError {
        return new VaultRuntimeError(
            AcquisitionErrorCode.UNKNOWN_CONVERTER,
            ErrorScope.CONVERSION,
            ErrorType.USER,
            `Unknown converter '${converter}'. Available converters: ${available.join(', ')}`,
            { converter, available }
        );
    },
};

export function hasCode(error: unknown, code: AcquisitionErrorCode): boolean {
    return error instanceof VaultRuntimeError && error.code === code;
}

export function isCancellation(error: unknown): boolean {
    return hasCode(error, AcquisitionErrorCode.CANCELLED);
}
