export { createLogger } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';
export { LogComponent } from './types.js';
export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { VaultLogger } from './vault-logger.js';
export type { VaultLoggerConfig } from './vault-logger.js';
export { LoggerConfigSchema, LoggerTransportSchema, LOG_LEVELS } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { createTransport } from './transport-factory.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
