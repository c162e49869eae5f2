import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { bytesResponse, stubFetch } from '../acquisition/test-utils.js';
import { createMockLogger } from '../logger/test-utils.js';
import { LocalModelsDocumentSchema } from '../storage/schemas.js';
import { ModelVault } from './ModelVault.js';

const MODEL_URL = 'https://files.example.com/tiny/model.bin';

const bundledCatalog = {
    version: '1',
    models: [
        {
            id: 'tiny-asr',
            name: 'Tiny ASR',
            description: 'Small speech recognizer',
            category: 'asr',
            tags: ['speech'],
            source: { kind: 'direct-url', url: MODEL_URL },
            storage: { localPath: '~/models/tiny-asr' },
        },
        {
            id: 'gated',
            name: 'Gated Diffusion',
            category: 'image_gen',
            source: { kind: 'manual-only', url: 'https://example.com/gated' },
            storage: { localPath: '~/models/gated' },
        },
    ],
};

describe('ModelVault', () => {
    let tempDir: string;
    let previousHome: string | undefined;
    let vault: ModelVault;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'model-vault-test-'));
        previousHome = process.env.HOME;
        process.env.HOME = tempDir;

        const bundledCatalogPath = path.join(tempDir, 'catalog.json');
        await fs.writeFile(bundledCatalogPath, JSON.stringify(bundledCatalog));
        vault = new ModelVault({
            config: { dataDir: path.join(tempDir, 'data') },
            env: {},
            logger: createMockLogger(),
            bundledCatalogPath,
        });
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        if (previousHome === undefined) {
            delete process.env.HOME;
        } else {
            process.env.HOME = previousHome;
        }
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function downloadAndRecord(modelId: string) {
        const session = await vault.download(modelId);
        await session.whenSettled();
        return vault.poll();
    }

    it('starts with every catalog model tracked and nothing installed', async () => {
        await vault.init();

        expect(vault.listModels().map((m) => [m.id, m.status.state])).toEqual([
            ['tiny-asr', 'not_downloaded'],
            ['gated', 'not_downloaded'],
        ]);
        expect(vault.listInstalled()).toEqual([]);
    });

    it('downloads a model and records it as ready', async () => {
        stubFetch({ [MODEL_URL]: () => bytesResponse(new Uint8Array(8).fill(3)) });
        await vault.init();

        const session = await vault.download('tiny-asr');
        expect(vault.getModel('tiny-asr')?.status.state).toBe('downloading');

        await session.whenSettled();
        const result = await vault.poll();

        expect(result).toEqual({
            progress: [],
            concluded: [{ modelId: 'tiny-asr', outcome: 'completed' }],
            keepPolling: false,
        });
        expect(vault.listInstalled().map((m) => m.id)).toEqual(['tiny-asr']);
        const stored = await fs.readFile(path.join(tempDir, 'models', 'tiny-asr', 'model.bin'));
        expect(stored.length).toBe(8);

        const document = LocalModelsDocumentSchema.parse(
            JSON.parse(await fs.readFile(path.join(tempDir, 'data', 'local_models.json'), 'utf-8'))
        );
        expect(document.models[0]?.status.state).toBe('ready');
    });

    it('rescans a finished download at the path the current catalog names', async () => {
        const documentPath = path.join(tempDir, 'data', 'local_models.json');
        await fs.mkdir(path.dirname(documentPath), { recursive: true });
        await fs.writeFile(
            documentPath,
            JSON.stringify({
                version: '1.0.0',
                models: [{ ...bundledCatalog.models[0], storage: { localPath: '~/models/tiny-v1' } }],
            })
        );
        stubFetch({ [MODEL_URL]: () => bytesResponse(new Uint8Array(8).fill(3)) });
        await vault.init();

        const result = await downloadAndRecord('tiny-asr');

        expect(result.concluded).toEqual([{ modelId: 'tiny-asr', outcome: 'completed' }]);
        const document = LocalModelsDocumentSchema.parse(JSON.parse(await fs.readFile(documentPath, 'utf-8')));
        expect(document.models[0]).toMatchObject({
            id: 'tiny-asr',
            storage: { localPath: '~/models/tiny-asr' },
            status: { state: 'ready', downloadedFiles: 1, downloadedBytes: 8 },
        });
    });

    it('records the manual-install message for manual-only models', async () => {
        const { mock } = stubFetch({});
        await vault.init();

        const result = await downloadAndRecord('gated');

        const message = 'This model requires manual installation. See https://example.com/gated';
        expect(result.concluded).toEqual([{ modelId: 'gated', outcome: 'failed', errorMessage: message }]);
        expect(vault.getModel('gated')?.status).toMatchObject({ state: 'error', errorMessage: message });
        expect(mock).not.toHaveBeenCalled();
    });

    it('removes an installed model', async () => {
        stubFetch({ [MODEL_URL]: () => bytesResponse(new Uint8Array(4)) });
        await vault.init();
        await downloadAndRecord('tiny-asr');

        const model = await vault.remove('tiny-asr');

        expect(model.status.state).toBe('not_downloaded');
        expect(vault.listInstalled()).toEqual([]);
    });

    it('picks up models already on disk at startup', async () => {
        await fs.mkdir(path.join(tempDir, 'models', 'tiny-asr'), { recursive: true });
        await fs.writeFile(path.join(tempDir, 'models', 'tiny-asr', 'model.bin'), 'x');

        await vault.init();

        expect(vault.listInstalled().map((m) => m.id)).toEqual(['tiny-asr']);
    });

    it('searches the catalog by tag', async () => {
        await vault.init();

        expect(vault.search('SPEECH').map((m) => m.id)).toEqual(['tiny-asr']);
    });

    it('rejects unknown model ids', async () => {
        await vault.init();

        await expect(vault.download('nope')).rejects.toMatchObject({ code: 'CAT_030' });
    });

    describe('lifecycle', () => {
        it('requires init before use', async () => {
            await expect(vault.download('tiny-asr')).rejects.toMatchObject({ code: 'ENG_001' });
        });

        it('refuses a second init', async () => {
            await vault.init();

            await expect(vault.init()).rejects.toMatchObject({ code: 'ENG_002' });
        });

        it('cannot be used after shutdown', async () => {
            await vault.init();
            await vault.shutdown();

            await expect(vault.poll()).rejects.toMatchObject({ code: 'ENG_003' });
        });
    });
});
