import { LOG_LEVELS } from '../logger/schemas.js';
import type { LoggerConfigInput } from '../logger/schemas.js';
import type { LogLevel } from '../logger/types.js';
import { ConfigError } from './errors.js';
import { VaultConfigSchema } from './schemas.js';
import type { VaultConfig, VaultConfigInput } from './schemas.js';

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Environment layer. Only variables that are set contribute fields.
 */
function configFromEnv(env: NodeJS.ProcessEnv): VaultConfigInput {
    const input: VaultConfigInput = {};

    if (env.MODELVAULT_HOME) {
        input.dataDir = env.MODELVAULT_HOME;
    }
    if (env.MODELVAULT_CATALOG_URL) {
        input.remoteCatalogUrl = env.MODELVAULT_CATALOG_URL;
    }

    const logger: LoggerConfigInput = {};
    const level = env.MODELVAULT_LOG_LEVEL;
    if (level) {
        if (!isLogLevel(level)) {
            throw ConfigError.invalidEnvValue('MODELVAULT_LOG_LEVEL', level, LOG_LEVELS.join(' | '));
        }
        logger.level = level;
    }
    if (env.MODELVAULT_LOG_FILE) {
        logger.transports = [{ type: 'console' }, { type: 'file', path: env.MODELVAULT_LOG_FILE }];
    }
    if (Object.keys(logger).length > 0) {
        input.logger = logger;
    }

    return input;
}

/**
 * Resolve engine configuration: schema defaults, then environment, then explicit overrides.
 *
 * @throws VaultRuntimeError (config scope) when the merged result fails validation
 */
export function resolveVaultConfig(
    overrides: VaultConfigInput = {},
    env: NodeJS.ProcessEnv = process.env
): VaultConfig {
    const fromEnv = configFromEnv(env);
    const merged: VaultConfigInput = {
        ...fromEnv,
        ...overrides,
        logger:
            overrides.logger || fromEnv.logger
                ? { ...fromEnv.logger, ...overrides.logger }
                : undefined,
    };

    const result = VaultConfigSchema.safeParse(merged);
    if (!result.success) {
        throw ConfigError.invalid(result.error.issues);
    }
    return result.data;
}
