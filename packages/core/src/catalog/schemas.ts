/**
 * Zod schemas for the model catalog document.
 */

import { z } from 'zod';

export const ModelCategorySchema = z.enum(['llm', 'vlm', 'asr', 'tts', 'image_gen']);

/**
 * Post-download conversion step. `options` is interpreted by the named converter.
 */
export const ConversionSchema = z
    .object({
        converter: z.string().min(1).describe('Registered converter name'),
        options: z.record(z.unknown()).default({}).describe('Converter-specific options'),
    })
    .strict();

const automaticSourceFields = {
    url: z.string().url().describe('Primary repository or file URL'),
    backupUrls: z
        .array(z.string().url())
        .default([])
        .describe('Mirrors tried in order after the primary fails'),
    revision: z.string().min(1).default('main').describe('Branch or revision to list'),
    conversion: ConversionSchema.optional(),
};

export const SourceSchema = z.discriminatedUnion('kind', [
    z
        .object({ kind: z.literal('remote-tree-api'), ...automaticSourceFields })
        .describe('Host with a per-directory tree listing API'),
    z
        .object({ kind: z.literal('remote-recursive-api'), ...automaticSourceFields })
        .describe('Host with a file listing API scoped by a root parameter'),
    z
        .object({ kind: z.literal('direct-url'), ...automaticSourceFields })
        .describe('Each candidate URL is a single downloadable file'),
    z
        .object({
            kind: z.literal('manual-only'),
            url: z.string().url().optional().describe('Homepage with installation steps'),
            instructions: z.string().optional().describe('Manual installation instructions'),
        })
        .describe('Cannot be fetched automatically'),
]);

export const StorageSchema = z.object({
    localPath: z.string().min(1).describe('Install directory; `~/` is expanded at use time'),
    sizeBytes: z.number().int().nonnegative().default(0).describe('Informational total size'),
    sizeDisplay: z.string().default('').describe('Informational size label'),
});

export const RuntimeSchema = z.object({
    memoryGb: z.number().nonnegative().default(0).describe('Approximate memory footprint'),
    platforms: z.array(z.string()).default([]).describe('Supported platforms'),
    supportsImages: z.boolean().default(false),
    supportsStreaming: z.boolean().default(true),
    quantization: z.string().optional(),
    apiModelId: z.string().optional().describe('Identifier the serving runtime expects'),
});

export const ModelEntrySchema = z.object({
    id: z.string().min(1).describe('Unique model identifier'),
    name: z.string().min(1).describe('Human-readable display name'),
    description: z.string().default(''),
    category: ModelCategorySchema,
    tags: z.array(z.string()).default([]),
    source: SourceSchema,
    storage: StorageSchema,
    runtime: RuntimeSchema.default({}),
});

export const CatalogSchema = z.object({
    version: z.string().min(1),
    models: z.array(ModelEntrySchema),
});

export type ModelEntryInput = z.input<typeof ModelEntrySchema>;
export type CatalogInput = z.input<typeof CatalogSchema>;
