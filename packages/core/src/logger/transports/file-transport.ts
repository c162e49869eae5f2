import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

/**
 * JSON-lines file transport with size-based rotation.
 *
 * `app.log` rotates to `app.log.1`, older files shift up to `app.log.{maxFiles}`
 * and the oldest is discarded. Entries written while a rotation is in progress
 * are buffered and flushed into the fresh file.
 */
export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private stream: fs.WriteStream | null = null;
    private currentSize = 0;
    private rotation: Promise<void> | null = null;
    private pending: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        try {
            this.currentSize = fs.statSync(this.filePath).size;
        } catch {
            this.currentSize = 0;
        }
        this.stream = this.open();
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';

        if (this.rotation || !this.stream) {
            this.pending.push(line);
            return;
        }

        const size = Buffer.byteLength(line, 'utf8');
        if (this.currentSize > 0 && this.currentSize + size > this.maxSize) {
            this.pending.push(line);
            this.rotation = this.rotate().finally(() => {
                this.rotation = null;
            });
            return;
        }

        this.stream.write(line);
        this.currentSize += size;
    }

    async destroy(): Promise<void> {
        if (this.rotation) {
            await this.rotation;
        }
        await this.close();
    }

    private open(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    private async close(): Promise<void> {
        const stream = this.stream;
        this.stream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }
    }

    private async rotate(): Promise<void> {
        try {
            await this.close();
            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });
            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await renameIfPresent(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await renameIfPresent(this.filePath, `${this.filePath}.1`);
        } catch (error) {
            console.error('FileTransport rotation error:', error);
        }

        this.currentSize = 0;
        this.stream = this.open();
        const buffered = this.pending;
        this.pending = [];
        for (const line of buffered) {
            this.stream.write(line);
            this.currentSize += Buffer.byteLength(line, 'utf8');
        }
    }
}

async function renameIfPresent(from: string, to: string): Promise<void> {
    try {
        await fs.promises.rename(from, to);
    } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
            throw error;
        }
    }
}
