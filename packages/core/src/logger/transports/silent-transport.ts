import type { LoggerTransport, LogEntry } from '../types.js';

/**
 * Discards every entry. Used by tests and by `--quiet` CLI runs.
 */
export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
