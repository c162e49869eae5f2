/**
 * Logger Types and Interfaces
 *
 * Core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with additional execution context components
 */
export enum LogComponent {
    CATALOG = 'catalog',
    LISTING = 'listing',
    FETCH = 'fetch',
    SESSION = 'session',
    CONVERSION = 'conversion',
    RECONCILER = 'reconciler',
    POLLER = 'poller',
    STORAGE = 'storage',
    CONFIG = 'config',

    // Execution context
    ENGINE = 'engine',
    CLI = 'cli',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: LogComponent;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;
    /** Most verbose level, for full payload dumps */
    silly(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component.
     * Shares transports and level with its parent.
     */
    createChild(component: LogComponent): Logger;

    /**
     * Set the log level dynamically.
     * Affects this logger and every logger sharing its level (parent and children).
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;
    destroy?(): void | Promise<void>;
};
