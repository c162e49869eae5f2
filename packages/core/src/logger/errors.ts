import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory
 */
export const LoggerError = {
    unknownTransportType(transportType: string): VaultRuntimeError {
        return new VaultRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    },

    transportInitializationFailed(transportType: string, reason: string): VaultRuntimeError {
        return new VaultRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason }
        );
    },

    invalidLogLevel(level: string, validLevels: readonly string[]): VaultRuntimeError {
        return new VaultRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels },
            `Use one of: ${validLevels.join(', ')}`
        );
    },
};
