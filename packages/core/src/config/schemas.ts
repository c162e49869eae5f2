import * as path from 'path';
import { z } from 'zod';
import { LoggerConfigSchema } from '../logger/schemas.js';
import { DEFAULT_DATA_DIR } from './paths.js';

export const AuthConfigSchema = z
    .object({
        tokenEnvVar: z
            .string()
            .default('HF_TOKEN')
            .describe('Environment variable holding a bearer token for model hosts'),
        tokenFiles: z
            .array(z.string())
            .default(['~/.cache/huggingface/token', '~/.huggingface/hub/token'])
            .describe('Token files tried in order when the environment variable is unset'),
    })
    .strict();

export const TimeoutConfigSchema = z
    .object({
        listingMs: z
            .number()
            .int()
            .positive()
            .default(30_000)
            .describe('Absolute timeout for one listing request'),
        transferMs: z
            .number()
            .int()
            .positive()
            .default(60 * 60 * 1000)
            .describe('Absolute timeout for one file transfer'),
        catalogRefreshMs: z
            .number()
            .int()
            .positive()
            .default(10_000)
            .describe('Absolute timeout for the background catalog refresh'),
    })
    .strict();

export const VaultConfigSchema = z
    .object({
        dataDir: z
            .string()
            .default(DEFAULT_DATA_DIR)
            .describe('Per-user data directory (home-relative paths allowed)'),
        catalogOverridePath: z
            .string()
            .optional()
            .describe('User-writable catalog merged over the bundled one'),
        localModelsPath: z
            .string()
            .optional()
            .describe('Persisted installed-models document'),
        remoteCatalogUrl: z
            .string()
            .url()
            .optional()
            .describe('Remote catalog fetched by background refresh; refresh is disabled when unset'),
        auth: AuthConfigSchema.default({}),
        timeouts: TimeoutConfigSchema.default({}),
        chunkSize: z
            .number()
            .int()
            .positive()
            .default(64 * 1024)
            .describe('Write chunk size for streamed transfers'),
        userAgent: z.string().default('modelvault/0.1.0').describe('User-Agent sent upstream'),
        logger: LoggerConfigSchema.default({}),
    })
    .strict()
    .transform((config) => ({
        ...config,
        catalogOverridePath:
            config.catalogOverridePath ?? path.join(config.dataDir, 'models_registry.json'),
        localModelsPath: config.localModelsPath ?? path.join(config.dataDir, 'local_models.json'),
    }));

export type VaultConfigInput = z.input<typeof VaultConfigSchema>;
export type VaultConfig = z.output<typeof VaultConfigSchema>;
export type AuthConfig = z.output<typeof AuthConfigSchema>;
export type TimeoutConfig = z.output<typeof TimeoutConfigSchema>;
