import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { resolveVaultConfig } from './resolver.js';
import { ConfigErrorCode } from './error-codes.js';
import { expandHome } from './paths.js';
import { VaultRuntimeError } from '../errors/runtime-error.js';

describe('resolveVaultConfig', () => {
    it('applies defaults and derives document paths from the data directory', () => {
        const config = resolveVaultConfig({}, {});

        expect(config.dataDir).toBe('~/.modelvault');
        expect(config.catalogOverridePath).toBe('~/.modelvault/models_registry.json');
        expect(config.localModelsPath).toBe('~/.modelvault/local_models.json');
        expect(config.remoteCatalogUrl).toBeUndefined();
        expect(config.chunkSize).toBe(65536);
        expect(config.timeouts).toEqual({
            listingMs: 30_000,
            transferMs: 3_600_000,
            catalogRefreshMs: 10_000,
        });
        expect(config.auth.tokenEnvVar).toBe('HF_TOKEN');
        expect(config.logger.level).toBe('warn');
    });

    it('reads the environment layer', () => {
        const config = resolveVaultConfig(
            {},
            {
                MODELVAULT_HOME: '/srv/models',
                MODELVAULT_CATALOG_URL: 'https://catalog.example.com/models.json',
                MODELVAULT_LOG_LEVEL: 'debug',
            }
        );

        expect(config.localModelsPath).toBe(path.join('/srv/models', 'local_models.json'));
        expect(config.remoteCatalogUrl).toBe('https://catalog.example.com/models.json');
        expect(config.logger.level).toBe('debug');
    });

    it('lets explicit overrides win over the environment', () => {
        const config = resolveVaultConfig(
            { dataDir: '/tmp/override', logger: { level: 'error' } },
            { MODELVAULT_HOME: '/srv/models', MODELVAULT_LOG_LEVEL: 'debug' }
        );

        expect(config.dataDir).toBe('/tmp/override');
        expect(config.logger.level).toBe('error');
    });

    it('rejects an unknown log level from the environment', () => {
        expect(() => resolveVaultConfig({}, { MODELVAULT_LOG_LEVEL: 'loud' })).toThrow(
            VaultRuntimeError
        );
        try {
            resolveVaultConfig({}, { MODELVAULT_LOG_LEVEL: 'loud' });
        } catch (error) {
            expect(error).toMatchObject({ code: ConfigErrorCode.INVALID_ENV_VALUE });
        }
    });

    it('reports schema violations as a config error', () => {
        expect(() =>
            resolveVaultConfig({ remoteCatalogUrl: 'not a url' }, {})
        ).toThrowError(/Invalid configuration: remoteCatalogUrl/);
    });
});

describe('expandHome', () => {
    it('leaves absolute and relative paths untouched', () => {
        expect(expandHome('/var/lib/models')).toBe('/var/lib/models');
        expect(expandHome('models/local')).toBe('models/local');
    });

    it('expands a leading tilde against HOME at call time', () => {
        const previous = process.env.HOME;
        process.env.HOME = '/home/tester';
        try {
            expect(expandHome('~/models/a')).toBe('/home/tester/models/a');
            expect(expandHome('~')).toBe('/home/tester');
        } finally {
            if (previous === undefined) {
                delete process.env.HOME;
            } else {
                process.env.HOME = previous;
            }
        }
    });
});
