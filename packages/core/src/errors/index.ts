export { VaultBaseError } from './base-error.js';
export { VaultRuntimeError, errorMessage } from './runtime-error.js';
export { ErrorScope, ErrorType } from './types.js';
export type { VaultErrorCode } from './types.js';
