/**
 * Persisted installed-models document.
 *
 * Every catalog entry is tracked with a mutable `status`. The whole document
 * is rewritten after each status transition; writes are applied one at a
 * time in call order. Disk contents are the ground truth on load: a
 * `downloading` status left by a crashed run never survives.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Catalog, ModelEntry } from '../catalog/types.js';
import { expandHome } from '../config/paths.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { removeModelFiles, scanModel } from '../reconciler/scan.js';
import type { DiskScan } from '../reconciler/scan.js';
import { isNotFound } from '../utils/fs.js';
import { StorageError } from './errors.js';
import { LOCAL_MODELS_VERSION, LocalModelsDocumentSchema } from './schemas.js';
import type { LocalModel, LocalModelsDocument, ModelStatusState } from './schemas.js';

export interface LocalModelsStoreOptions {
    /** Document location; home-relative paths allowed */
    filePath: string;
    logger: Logger;
    /** Clock for timestamps, replaced in tests */
    now?: () => Date;
}

export class LocalModelsStore {
    private document: LocalModelsDocument | null = null;
    private writes: Promise<void> = Promise.resolve();
    private readonly filePath: string;
    private readonly now: () => Date;

    constructor(private readonly options: LocalModelsStoreOptions) {
        this.filePath = expandHome(options.filePath);
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Read the document, replace tracked entries with their current catalog
     * version (keeping only `status`), add catalog entries it does not track
     * yet, reconcile every entry from disk, then save.
     *
     * A missing or invalid document is rebuilt from the catalog. Entries the
     * catalog no longer lists are kept as they are.
     */
    async load(catalog: Catalog): Promise<LocalModel[]> {
        const document = (await this.read()) ?? this.seed(catalog);

        const entries = new Map(catalog.models.map((entry) => [entry.id, entry]));
        document.models = document.models.map((model) => {
            const entry = entries.get(model.id);
            return entry ? { ...structuredClone(entry), status: model.status } : model;
        });
        const tracked = new Set(document.models.map((model) => model.id));
        for (const entry of catalog.models) {
            if (!tracked.has(entry.id)) {
                document.models.push(toLocalModel(entry));
            }
        }

        const stamp = this.now().toISOString();
        for (const model of document.models) {
            applyScan(model, await scanModel(model, this.options.logger), stamp);
        }

        this.document = document;
        await this.save();
        this.options.logger.info(`Tracking ${document.models.length} local models`, {
            ready: document.models.filter((model) => model.status.state === 'ready').length,
        });
        return this.list();
    }

    list(): LocalModel[] {
        return structuredClone(this.current('list').models);
    }

    get(modelId: string): LocalModel | undefined {
        const model = this.current('get').models.find((candidate) => candidate.id === modelId);
        return model ? structuredClone(model) : undefined;
    }

    /**
     * Record a status transition and rewrite the document.
     * `message` is kept only for the error state.
     */
    async setStatus(modelId: string, state: ModelStatusState, message?: string): Promise<LocalModel> {
        const model = this.find(modelId, 'setStatus');
        model.status = {
            ...model.status,
            state,
            errorMessage: state === 'error' ? (message ?? 'Unknown error') : undefined,
        };
        if (state === 'ready') {
            model.status.lastDownloaded = this.now().toISOString();
        }
        await this.save();
        return structuredClone(model);
    }

    /**
     * Rescan one model's directory and persist the result
     */
    async refresh(modelId: string): Promise<LocalModel> {
        const model = this.find(modelId, 'refresh');
        applyScan(model, await scanModel(model, this.options.logger), this.now().toISOString());
        await this.save();
        return structuredClone(model);
    }

    /**
     * Delete the model's files, then reconcile from disk
     */
    async remove(modelId: string): Promise<LocalModel> {
        const model = this.find(modelId, 'remove');
        const removed = await removeModelFiles(model);
        this.options.logger.info(
            removed ? `Removed files for ${modelId}` : `No files to remove for ${modelId}`
        );
        return this.refresh(modelId);
    }

    private find(modelId: string, method: string): LocalModel {
        const model = this.current(method).models.find((candidate) => candidate.id === modelId);
        if (!model) {
            throw StorageError.modelNotFound(modelId);
        }
        return model;
    }

    private current(method: string): LocalModelsDocument {
        if (!this.document) {
            throw StorageError.notLoaded(method);
        }
        return this.document;
    }

    private seed(catalog: Catalog): LocalModelsDocument {
        this.options.logger.debug(`Seeding local models document from catalog ${catalog.version}`);
        return { version: LOCAL_MODELS_VERSION, models: catalog.models.map(toLocalModel) };
    }

    private async read(): Promise<LocalModelsDocument | null> {
        const { logger } = this.options;
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (!isNotFound(error)) {
                const failure = StorageError.readFailed(this.filePath, errorMessage(error));
                logger.warn(failure.message, { code: failure.code });
            }
            return null;
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            const invalid = StorageError.documentInvalid(this.filePath, errorMessage(error));
            logger.warn(invalid.message, { code: invalid.code });
            return null;
        }
        const parsed = LocalModelsDocumentSchema.safeParse(json);
        if (!parsed.success) {
            const invalid = StorageError.documentInvalid(this.filePath, parsed.error.message);
            logger.warn(invalid.message, { code: invalid.code });
            return null;
        }
        if (parsed.data.version !== LOCAL_MODELS_VERSION) {
            logger.debug(`Upgrading local models document from ${parsed.data.version}`);
        }
        return { ...parsed.data, version: LOCAL_MODELS_VERSION };
    }

    /**
     * Queue a full rewrite behind any write still in flight. Each caller sees
     * the outcome of its own write.
     */
    private save(): Promise<void> {
        const write = this.writes.then(() => this.write());
        this.writes = write.catch(() => undefined);
        return write;
    }

    private async write(): Promise<void> {
        const document = this.current('save');
        document.lastUpdated = this.now().toISOString();
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(this.filePath, JSON.stringify(document, null, 2), 'utf-8');
        } catch (error) {
            throw StorageError.writeFailed(this.filePath, errorMessage(error));
        }
    }
}

function applyScan(model: LocalModel, scan: DiskScan, checkedAt: string): void {
    model.status = {
        ...model.status,
        state: scan.state === 'downloaded' ? 'ready' : 'not_downloaded',
        errorMessage: undefined,
        downloadedFiles: scan.files,
        downloadedBytes: scan.bytes,
        lastChecked: checkedAt,
    };
}

function toLocalModel(entry: ModelEntry): LocalModel {
    return {
        ...structuredClone(entry),
        status: { state: 'not_downloaded', downloadedFiles: 0, downloadedBytes: 0 },
    };
}
