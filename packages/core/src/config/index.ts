export { resolveVaultConfig } from './resolver.js';
export { VaultConfigSchema, AuthConfigSchema, TimeoutConfigSchema } from './schemas.js';
export type { VaultConfig, VaultConfigInput, AuthConfig, TimeoutConfig } from './schemas.js';
export { expandHome, DEFAULT_DATA_DIR } from './paths.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
