export { ModelVault } from './ModelVault.js';
export type { ModelVaultOptions } from './ModelVault.js';
export { VaultEngineError } from './errors.js';
export { VaultEngineErrorCode } from './error-codes.js';
