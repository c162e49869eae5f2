import { describe, it, expect, afterEach, vi } from 'vitest';
import { createMockLogger } from '../../logger/test-utils.js';
import { AcquisitionErrorCode } from '../error-codes.js';
import { jsonResponse, stubFetch } from '../test-utils.js';
import { RecursiveApiLister } from './recursive-lister.js';
import { DirectUrlLister } from './direct-lister.js';

const REPO_URL = 'https://scope.example.com/models/org/asr';
const FILES = 'https://scope.example.com/api/v1/models/org/asr/repo/files?Revision=master';

function createLister() {
    return new RecursiveApiLister({
        userAgent: 'modelvault-test',
        timeoutMs: 5000,
        logger: createMockLogger(),
    });
}

describe('RecursiveApiLister', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('expands tree entries with a root-scoped call', async () => {
        const { requests } = stubFetch({
            [FILES]: () =>
                jsonResponse({
                    Code: 200,
                    Data: {
                        Files: [
                            { Path: 'am.mvn', Size: 10, Type: 'blob' },
                            { Path: 'example', Type: 'tree' },
                            { Path: 'model.pt', Size: 500, Type: 'blob' },
                        ],
                    },
                }),
            [`${FILES}&Root=example`]: () =>
                jsonResponse({
                    Code: 200,
                    Data: { Files: [{ Path: 'example/asr.wav', Size: 7, Type: 'blob' }] },
                }),
        });

        const files = await createLister().list({ url: REPO_URL, revision: 'master' });

        expect(requests.map((r) => r.url)).toEqual([FILES, `${FILES}&Root=example`]);
        expect(files).toEqual([
            {
                path: 'am.mvn',
                size: 10,
                downloadUrl:
                    'https://scope.example.com/api/v1/models/org/asr/repo?Revision=master&FilePath=am.mvn',
            },
            {
                path: 'example/asr.wav',
                size: 7,
                downloadUrl:
                    'https://scope.example.com/api/v1/models/org/asr/repo?Revision=master&FilePath=example%2Fasr.wav',
            },
            {
                path: 'model.pt',
                size: 500,
                downloadUrl:
                    'https://scope.example.com/api/v1/models/org/asr/repo?Revision=master&FilePath=model.pt',
            },
        ]);
    });

    it('collapses duplicate paths reported by nested calls', async () => {
        stubFetch({
            [FILES]: () =>
                jsonResponse({
                    Code: 200,
                    Data: {
                        Files: [
                            { Path: 'sub/a.bin', Size: 1, Type: 'blob' },
                            { Path: 'sub', Type: 'tree' },
                        ],
                    },
                }),
            [`${FILES}&Root=sub`]: () =>
                jsonResponse({
                    Code: 200,
                    Data: { Files: [{ Path: 'sub/a.bin', Size: 1, Type: 'blob' }] },
                }),
        });

        const files = await createLister().list({ url: REPO_URL, revision: 'master' });

        expect(files.map((f) => f.path)).toEqual(['sub/a.bin']);
    });

    it('fails on a non-200 envelope code', async () => {
        stubFetch({
            [FILES]: () => jsonResponse({ Code: 404, Message: 'not found' }),
        });

        await expect(createLister().list({ url: REPO_URL, revision: 'master' })).rejects.toMatchObject({
            code: AcquisitionErrorCode.MALFORMED_RESPONSE,
            message: `Unexpected listing response from ${FILES}: Code 404: not found`,
        });
    });

    it('fails when the repository has no files', async () => {
        stubFetch({ [FILES]: () => jsonResponse({ Code: 200, Data: { Files: [] } }) });

        await expect(createLister().list({ url: REPO_URL, revision: 'master' })).rejects.toMatchObject({
            code: AcquisitionErrorCode.EMPTY_LISTING,
        });
    });
});

describe('DirectUrlLister', () => {
    it('lists the URL basename without a network call', async () => {
        const fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);

        const files = await new DirectUrlLister().list({
            url: 'https://cdn.example.com/weights/ggml%20base.bin',
            revision: 'main',
        });

        expect(files).toEqual([
            {
                path: 'ggml base.bin',
                size: 0,
                downloadUrl: 'https://cdn.example.com/weights/ggml%20base.bin',
            },
        ]);
        expect(fetchMock).not.toHaveBeenCalled();
        vi.unstubAllGlobals();
    });
});
