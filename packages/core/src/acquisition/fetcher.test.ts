import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AcquisitionErrorCode } from './error-codes.js';
import { fetchToFile } from './fetcher.js';
import type { FetchFileOptions } from './fetcher.js';
import { bytesResponse, chunkedResponse, stubFetch } from './test-utils.js';

const URL_A = 'https://files.example.com/org/model/resolve/main/weights.bin';

function options(overrides: Partial<FetchFileOptions> = {}): FetchFileOptions {
    return {
        signal: new AbortController().signal,
        timeoutMs: 5000,
        chunkSize: 4,
        userAgent: 'modelvault-test',
        ...overrides,
    };
}

describe('fetchToFile', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetcher-test-'));
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('creates parent directories and writes the body', async () => {
        stubFetch({ [URL_A]: () => bytesResponse(new TextEncoder().encode('hello world')) });
        const dest = path.join(tempDir, 'nested', 'dir', 'weights.bin');

        const written = await fetchToFile(URL_A, dest, options());

        expect(written).toBe(11);
        expect(await fs.readFile(dest, 'utf-8')).toBe('hello world');
    });

    it('reports cumulative progress in chunk-size steps', async () => {
        stubFetch({
            [URL_A]: () => chunkedResponse([new Uint8Array(6), new Uint8Array(3)]),
        });
        const progress: number[] = [];

        const written = await fetchToFile(
            URL_A,
            path.join(tempDir, 'weights.bin'),
            options({ onProgress: (bytes) => progress.push(bytes) })
        );

        expect(written).toBe(9);
        expect(progress).toEqual([4, 6, 9]);
    });

    it('fails fast without a request when already cancelled', async () => {
        const { mock } = stubFetch({});
        const controller = new AbortController();
        controller.abort();

        await expect(
            fetchToFile(URL_A, path.join(tempDir, 'weights.bin'), options({ signal: controller.signal }))
        ).rejects.toMatchObject({ code: AcquisitionErrorCode.CANCELLED });
        expect(mock).not.toHaveBeenCalled();
    });

    it('removes the partial file when cancelled between chunks', async () => {
        stubFetch({
            [URL_A]: () => chunkedResponse([new Uint8Array(4), new Uint8Array(4), new Uint8Array(4)]),
        });
        const controller = new AbortController();
        const dest = path.join(tempDir, 'weights.bin');

        await expect(
            fetchToFile(
                URL_A,
                dest,
                options({
                    signal: controller.signal,
                    modelId: 'model-a',
                    onProgress: (bytes) => {
                        if (bytes >= 4) controller.abort();
                    },
                })
            )
        ).rejects.toMatchObject({
            code: AcquisitionErrorCode.CANCELLED,
            message: 'Download of model-a cancelled',
        });

        await expect(fs.access(dest)).rejects.toThrow();
    });

    it('surfaces non-success statuses without creating the file', async () => {
        stubFetch({ [URL_A]: () => new Response('gone', { status: 404, statusText: 'Not Found' }) });
        const dest = path.join(tempDir, 'weights.bin');

        await expect(fetchToFile(URL_A, dest, options())).rejects.toMatchObject({
            code: AcquisitionErrorCode.HTTP_STATUS,
            message: `HTTP 404 Not Found from ${URL_A}`,
        });
        await expect(fs.access(dest)).rejects.toThrow();
    });

    it('reports a gated file as requiring authentication', async () => {
        stubFetch({ [URL_A]: () => new Response('', { status: 403 }) });

        await expect(
            fetchToFile(URL_A, path.join(tempDir, 'weights.bin'), options({ token: 'test-secret' }))
        ).rejects.toMatchObject({ code: AcquisitionErrorCode.AUTH_REQUIRED });
    });

    it('releases the response body when the file cannot be opened', async () => {
        const cancel = vi.fn();
        const stream = new ReadableStream<Uint8Array>({
            pull(controller) {
                controller.enqueue(new Uint8Array(2));
            },
            cancel,
        });
        stubFetch({ [URL_A]: () => new Response(stream, { status: 200 }) });
        const dest = path.join(tempDir, 'weights.bin');
        await fs.mkdir(dest);

        await expect(fetchToFile(URL_A, dest, options())).rejects.toMatchObject({
            code: AcquisitionErrorCode.FILESYSTEM,
        });
        expect(cancel).toHaveBeenCalledOnce();
    });

    it('reports a broken stream as a network error', async () => {
        let sent = false;
        const stream = new ReadableStream<Uint8Array>({
            pull(controller) {
                if (!sent) {
                    sent = true;
                    controller.enqueue(new Uint8Array(2));
                } else {
                    controller.error(new Error('socket hang up'));
                }
            },
        });
        stubFetch({ [URL_A]: () => new Response(stream, { status: 200 }) });

        await expect(
            fetchToFile(URL_A, path.join(tempDir, 'weights.bin'), options())
        ).rejects.toMatchObject({
            code: AcquisitionErrorCode.NETWORK_FAILED,
            message: `Network error for ${URL_A}: socket hang up`,
        });
    });
});
