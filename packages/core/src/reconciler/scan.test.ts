import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ModelEntrySchema } from '../catalog/schemas.js';
import { inspectModelDirectory, removeModelFiles, scanModel } from './scan.js';

describe('reconciler', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'reconciler-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('inspectModelDirectory', () => {
        it('reports an empty directory as not downloaded', async () => {
            expect(await inspectModelDirectory(tempDir)).toEqual({
                state: 'not_downloaded',
                files: 0,
                bytes: 0,
            });
        });

        it('ignores hidden entries', async () => {
            await fs.writeFile(path.join(tempDir, '.DS_Store'), '');
            await fs.mkdir(path.join(tempDir, '.cache'));

            expect((await inspectModelDirectory(tempDir)).state).toBe('not_downloaded');
        });

        it('reports a directory with one ordinary file as downloaded', async () => {
            await fs.writeFile(path.join(tempDir, 'model.safetensors'), 'weights');

            expect(await inspectModelDirectory(tempDir)).toEqual({
                state: 'downloaded',
                files: 1,
                bytes: 7,
            });
        });

        it('counts subdirectories as content', async () => {
            await fs.mkdir(path.join(tempDir, 'tokenizer'));

            expect((await inspectModelDirectory(tempDir)).state).toBe('downloaded');
        });

        it('sizes visible files inside subdirectories', async () => {
            await fs.writeFile(path.join(tempDir, 'config.json'), '{}');
            await fs.mkdir(path.join(tempDir, 'tokenizer'));
            await fs.writeFile(path.join(tempDir, 'tokenizer', 'vocab.txt'), 'abcde');
            await fs.writeFile(path.join(tempDir, 'tokenizer', '.lock'), 'ignored');

            expect(await inspectModelDirectory(tempDir)).toEqual({
                state: 'downloaded',
                files: 2,
                bytes: 7,
            });
        });

        it('reports a missing directory as not downloaded', async () => {
            expect((await inspectModelDirectory(path.join(tempDir, 'absent'))).state).toBe(
                'not_downloaded'
            );
        });

        it('reports a regular file in place of the directory as not downloaded', async () => {
            const file = path.join(tempDir, 'not-a-dir');
            await fs.writeFile(file, 'x');

            expect((await inspectModelDirectory(file)).state).toBe('not_downloaded');
        });
    });

    describe('with home-relative paths', () => {
        let previousHome: string | undefined;

        beforeEach(() => {
            previousHome = process.env.HOME;
            process.env.HOME = tempDir;
        });

        afterEach(() => {
            if (previousHome === undefined) {
                delete process.env.HOME;
            } else {
                process.env.HOME = previousHome;
            }
        });

        const entry = ModelEntrySchema.parse({
            id: 'tiny',
            name: 'Tiny',
            category: 'asr',
            source: { kind: 'direct-url', url: 'https://files.example.com/tiny.bin' },
            storage: { localPath: '~/models/tiny' },
        });

        it('expands the storage path before scanning', async () => {
            await fs.mkdir(path.join(tempDir, 'models', 'tiny'), { recursive: true });
            await fs.writeFile(path.join(tempDir, 'models', 'tiny', 'tiny.bin'), 'x');

            expect(await scanModel(entry)).toEqual({ state: 'downloaded', files: 1, bytes: 1 });
        });

        it('removes the install directory and reports whether anything was there', async () => {
            const directory = path.join(tempDir, 'models', 'tiny');
            await fs.mkdir(directory, { recursive: true });
            await fs.writeFile(path.join(directory, 'tiny.bin'), 'x');

            expect(await removeModelFiles(entry)).toBe(true);
            expect((await scanModel(entry)).state).toBe('not_downloaded');
            expect(await removeModelFiles(entry)).toBe(false);
        });
    });
});
