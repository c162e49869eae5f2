import type { LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { LogComponent } from './types.js';
import { VaultLogger } from './vault-logger.js';
import { createTransport } from './transport-factory.js';

export interface CreateLoggerOptions {
    config: LoggerConfig;
    /** Component identifier (defaults to ENGINE) */
    component?: LogComponent;
}

/**
 * Create a logger from validated configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({ config: vaultConfig.logger, component: LogComponent.CLI });
 * logger.info('Catalog loaded', { models: 12 });
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, component = LogComponent.ENGINE } = options;
    return new VaultLogger({
        level: config.level,
        component,
        transports: config.transports.map(createTransport),
    });
}
