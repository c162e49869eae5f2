import * as fs from 'fs';
import * as path from 'path';
import { tmpdir } from 'os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadEnvironmentVariables } from './env.js';

describe('loadEnvironmentVariables', () => {
    let home: string;
    let project: string;

    beforeEach(() => {
        home = fs.mkdtempSync(path.join(tmpdir(), 'env-home-'));
        project = fs.mkdtempSync(path.join(tmpdir(), 'env-project-'));
        fs.mkdirSync(path.join(home, '.modelvault'));
    });

    afterEach(() => {
        fs.rmSync(home, { recursive: true, force: true });
        fs.rmSync(project, { recursive: true, force: true });
    });

    it('returns only shell values when no .env files exist', () => {
        const env = loadEnvironmentVariables({ cwd: project, home, shell: { HF_TOKEN: 'test-secret' } });

        expect(env).toEqual({ HF_TOKEN: 'test-secret' });
    });

    it('lets the project .env override the global one', () => {
        fs.writeFileSync(
            path.join(home, '.modelvault', '.env'),
            'MODELVAULT_LOG_LEVEL=debug\nMODELVAULT_HOME=/srv/global\n'
        );
        fs.writeFileSync(path.join(project, '.env'), 'MODELVAULT_HOME=/srv/project\n');

        const env = loadEnvironmentVariables({ cwd: project, home, shell: {} });

        expect(env).toEqual({ MODELVAULT_LOG_LEVEL: 'debug', MODELVAULT_HOME: '/srv/project' });
    });

    it('gives the shell the final word but ignores empty shell values', () => {
        fs.writeFileSync(path.join(project, '.env'), 'HF_TOKEN=from-file\nMODELVAULT_HOME=/srv/file\n');

        const env = loadEnvironmentVariables({
            cwd: project,
            home,
            shell: { HF_TOKEN: 'test-secret', MODELVAULT_HOME: '' },
        });

        expect(env).toEqual({ HF_TOKEN: 'test-secret', MODELVAULT_HOME: '/srv/file' });
    });
});
