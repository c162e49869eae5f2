import { z } from 'zod';
import { ModelEntrySchema } from '../catalog/schemas.js';

export const LOCAL_MODELS_VERSION = '1.0.0';

export const ModelStatusStateSchema = z.enum(['not_downloaded', 'downloading', 'ready', 'error']);

export const ModelStatusSchema = z.object({
    state: ModelStatusStateSchema.default('not_downloaded'),
    errorMessage: z.string().optional().describe('Set only while state is error'),
    downloadedFiles: z.number().int().nonnegative().default(0).describe('Visible entries found by the last scan'),
    downloadedBytes: z.number().nonnegative().default(0).describe('Bytes found by the last scan'),
    lastChecked: z.string().optional().describe('ISO timestamp of the last disk scan'),
    lastDownloaded: z.string().optional().describe('ISO timestamp of the last completed download'),
});

export const LocalModelSchema = ModelEntrySchema.extend({
    status: ModelStatusSchema.default({}),
});

export const LocalModelsDocumentSchema = z.object({
    version: z.string().default(LOCAL_MODELS_VERSION),
    lastUpdated: z.string().optional(),
    models: z.array(LocalModelSchema).default([]),
});

export type ModelStatusState = z.output<typeof ModelStatusStateSchema>;
export type ModelStatus = z.output<typeof ModelStatusSchema>;
export type LocalModel = z.output<typeof LocalModelSchema>;
export type LocalModelsDocument = z.output<typeof LocalModelsDocumentSchema>;
