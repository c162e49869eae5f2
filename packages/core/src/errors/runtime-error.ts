import { VaultBaseError } from './base-error.js';
import type { ErrorScope, ErrorType, VaultErrorCode } from './types.js';

/**
 * Typed runtime error thrown by every module of the engine.
 *
 * Modules never construct this directly; they go through their own error
 * factory (`CatalogError`, `AcquisitionError`, ...) so codes, scopes and
 * recovery hints stay consistent.
 */
export class VaultRuntimeError<C extends Record<string, unknown> = Record<string, unknown>>
    extends VaultBaseError
{
    constructor(
        public readonly code: VaultErrorCode,
        public readonly scope: ErrorScope,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[],
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            scope: this.scope,
            type: this.type,
            message: this.message,
            context: this.context,
            recovery: this.recovery,
        };
    }
}

/**
 * Extract a displayable message from any thrown value
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? String(error);
    } catch {
        return String(error);
    }
}
