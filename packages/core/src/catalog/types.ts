import type { z } from 'zod';
import type {
    CatalogSchema,
    ConversionSchema,
    ModelCategorySchema,
    ModelEntrySchema,
    SourceSchema,
} from './schemas.js';

export type ModelCategory = z.output<typeof ModelCategorySchema>;
export type ModelSource = z.output<typeof SourceSchema>;
export type SourceKind = ModelSource['kind'];
export type ConversionSpec = z.output<typeof ConversionSchema>;
export type ModelEntry = z.output<typeof ModelEntrySchema>;
export type Catalog = z.output<typeof CatalogSchema>;

/** Sources the worker can fetch without user intervention */
export type AutomaticSource = Exclude<ModelSource, { kind: 'manual-only' }>;
export type ManualSource = Extract<ModelSource, { kind: 'manual-only' }>;
