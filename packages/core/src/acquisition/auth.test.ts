import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolveAuthToken } from './auth.js';

describe('resolveAuthToken', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'auth-token-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('prefers the environment variable', async () => {
        const tokenFile = path.join(tempDir, 'token');
        await fs.writeFile(tokenFile, 'file-token');

        const token = await resolveAuthToken(
            { tokenEnvVar: 'HF_TOKEN', tokenFiles: [tokenFile] },
            { env: { HF_TOKEN: '  test-secret\n' } }
        );

        expect(token).toBe('test-secret');
    });

    it('falls back to the first non-empty token file', async () => {
        const empty = path.join(tempDir, 'empty');
        const filled = path.join(tempDir, 'filled');
        await fs.writeFile(empty, '\n');
        await fs.writeFile(filled, 'test-secret\n');

        const token = await resolveAuthToken(
            {
                tokenEnvVar: 'HF_TOKEN',
                tokenFiles: [path.join(tempDir, 'missing'), empty, filled],
            },
            { env: {} }
        );

        expect(token).toBe('test-secret');
    });

    it('returns undefined when nothing is configured', async () => {
        const token = await resolveAuthToken(
            { tokenEnvVar: 'HF_TOKEN', tokenFiles: [path.join(tempDir, 'missing')] },
            { env: {} }
        );
        expect(token).toBeUndefined();
    });
});
