import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

/**
 * Terminal output. Warnings and errors go to stderr so they never mix with
 * command output piped from stdout.
 */
export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    write(entry: LogEntry): void {
        const time = new Date(entry.timestamp).toLocaleTimeString();
        let line = `${time} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}`;

        if (this.colorize) {
            line = colorFor(entry.level)(line);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            line += '\n' + JSON.stringify(entry.context, null, 2);
        }

        if (entry.level === 'error' || entry.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}

function colorFor(level: LogLevel): (text: string) => string {
    switch (level) {
        case 'debug':
        case 'silly':
            return chalk.gray;
        case 'info':
            return chalk.cyan;
        case 'warn':
            return chalk.yellow;
        case 'error':
            return chalk.red;
    }
}
