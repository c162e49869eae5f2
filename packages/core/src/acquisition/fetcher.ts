import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors/runtime-error.js';
import { ErrorScope } from '../errors/types.js';
import { AcquisitionError } from './errors.js';
import { getOk, requestSignal, toTransferError } from './http.js';

export interface FetchFileOptions {
    /** Session cancel signal, checked before every chunk */
    signal: AbortSignal;
    /** Absolute timeout for the request and the whole body */
    timeoutMs: number;
    /** Largest slice written per checkpoint */
    chunkSize: number;
    userAgent: string;
    token?: string | undefined;
    /** Cumulative bytes written so far */
    onProgress?: (bytesWritten: number) => void;
    /** Label used in the cancellation error */
    modelId?: string;
}

/**
 * Stream one remote file to `destPath`.
 *
 * On cancellation the partial file is removed and a CANCELLED error is thrown.
 * Other failures leave whatever was written in place; cleanup is the caller's
 * decision.
 *
 * @returns bytes written
 */
export async function fetchToFile(
    url: string,
    destPath: string,
    options: FetchFileOptions
): Promise<number> {
    const { signal, chunkSize, onProgress } = options;
    const cancelled = () => AcquisitionError.cancelled(options.modelId ?? path.basename(destPath));

    if (signal.aborted) {
        throw cancelled();
    }

    try {
        await fs.mkdir(path.dirname(destPath), { recursive: true });
    } catch (error) {
        throw AcquisitionError.filesystem(path.dirname(destPath), errorMessage(error));
    }

    const combined = requestSignal(options.timeoutMs, signal);
    let response: Response;
    try {
        response = await getOk(url, options, ErrorScope.FETCH, combined);
    } catch (error) {
        if (signal.aborted) {
            throw cancelled();
        }
        throw error;
    }

    const reader = response.body?.getReader();
    if (!reader) {
        throw AcquisitionError.network(url, 'Response has no body');
    }

    let handle: FileHandle | undefined;
    let written = 0;
    try {
        try {
            handle = await fs.open(destPath, 'w');
        } catch (error) {
            throw AcquisitionError.filesystem(destPath, errorMessage(error));
        }

        while (true) {
            let result: Awaited<ReturnType<typeof reader.read>>;
            try {
                result = await reader.read();
            } catch (error) {
                if (signal.aborted) {
                    throw cancelled();
                }
                throw toTransferError(url, error, options.timeoutMs, ErrorScope.FETCH);
            }
            if (result.done) {
                break;
            }

            const chunk = result.value;
            for (let offset = 0; offset < chunk.byteLength; offset += chunkSize) {
                if (signal.aborted) {
                    throw cancelled();
                }
                const slice = chunk.subarray(offset, Math.min(offset + chunkSize, chunk.byteLength));
                try {
                    await handle.write(slice);
                } catch (error) {
                    throw AcquisitionError.filesystem(destPath, errorMessage(error));
                }
                written += slice.byteLength;
                onProgress?.(written);
            }
        }

        await handle.close();
        handle = undefined;
        return written;
    } catch (error) {
        await reader.cancel().catch(() => undefined);
        if (handle) {
            await handle.close().catch(() => undefined);
        }
        if (signal.aborted) {
            await fs.rm(destPath, { force: true });
            throw cancelled();
        }
        throw error;
    }
}
