import { VaultRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { VaultEngineErrorCode } from './error-codes.js';

export class VaultEngineError {
    static notStarted() {
        return new VaultRuntimeError(
            VaultEngineErrorCode.NOT_STARTED,
            ErrorScope.ENGINE,
            ErrorType.USER,
            'ModelVault is not started',
            {},
            'Call init() before using the vault'
        );
    }

    static alreadyStarted() {
        return new VaultRuntimeError(
            VaultEngineErrorCode.ALREADY_STARTED,
            ErrorScope.ENGINE,
            ErrorType.USER,
            'ModelVault is already started'
        );
    }

    static stopped() {
        return new VaultRuntimeError(
            VaultEngineErrorCode.STOPPED,
            ErrorScope.ENGINE,
            ErrorType.USER,
            'ModelVault has been shut down',
            {},
            'Create a new ModelVault instance'
        );
    }
}
