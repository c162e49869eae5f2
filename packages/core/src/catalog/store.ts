import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { expandHome } from '../config/paths.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { isNotFound } from '../utils/fs.js';
import { CatalogError } from './errors.js';
import { CatalogSchema } from './schemas.js';
import type { Catalog, ModelCategory, ModelEntry } from './types.js';

const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('./default-catalog.json', import.meta.url));

export interface CatalogStoreOptions {
    /** User-writable override document; home-relative paths allowed */
    overridePath: string;
    /** Remote catalog for background refresh. Refresh is a no-op when unset. */
    remoteUrl?: string | undefined;
    refreshTimeoutMs: number;
    userAgent: string;
    logger: Logger;
    /** Alternate bundled catalog, used by tests */
    bundledPath?: string;
}

/**
 * Last-writer-wins merge at entry granularity.
 *
 * An incoming entry replaces the base entry with the same id wholesale; unknown
 * ids are appended. The base version tag is kept.
 */
export function mergeCatalogs(base: Catalog, incoming: Catalog): Catalog {
    const models = [...base.models];
    for (const entry of incoming.models) {
        const index = models.findIndex((existing) => existing.id === entry.id);
        if (index === -1) {
            models.push(entry);
        } else {
            models[index] = entry;
        }
    }
    return { version: base.version, models };
}

/**
 * Owns the process-wide catalog.
 *
 * The store is the only writer. Every query hands out clones, so callers may
 * keep or mutate what they receive without affecting later reads.
 */
export class CatalogStore {
    private catalog: Catalog | null = null;
    private refreshPromise: Promise<boolean> | null = null;
    private readonly overridePath: string;
    private readonly bundledPath: string;

    constructor(private readonly options: CatalogStoreOptions) {
        this.overridePath = expandHome(options.overridePath);
        this.bundledPath = options.bundledPath ?? BUNDLED_CATALOG_PATH;
    }

    /**
     * Parse the bundled catalog and merge the user override on top.
     * A broken override is logged and ignored.
     *
     * @throws VaultRuntimeError if the bundled catalog is invalid
     */
    async load(): Promise<Catalog> {
        const { logger } = this.options;
        let catalog = await this.readBundled();

        const override = await this.readOverride();
        if (override) {
            catalog = mergeCatalogs(catalog, override);
            logger.info(`Merged catalog override from ${this.overridePath}`, {
                overrideModels: override.models.length,
            });
        }

        this.catalog = catalog;
        logger.info(`Catalog loaded with ${catalog.models.length} models`, {
            version: catalog.version,
        });
        return structuredClone(catalog);
    }

    snapshot(): Catalog {
        return structuredClone(this.current());
    }

    get(modelId: string): ModelEntry | undefined {
        const entry = this.current().models.find((model) => model.id === modelId);
        return entry ? structuredClone(entry) : undefined;
    }

    /**
     * @throws VaultRuntimeError when the id is unknown
     */
    require(modelId: string): ModelEntry {
        const entry = this.get(modelId);
        if (!entry) {
            throw CatalogError.modelNotFound(modelId);
        }
        return entry;
    }

    byCategory(category: ModelCategory): ModelEntry[] {
        return structuredClone(this.current().models.filter((model) => model.category === category));
    }

    /**
     * Case-insensitive substring match over name, description and tags
     */
    search(query: string): ModelEntry[] {
        const needle = query.trim().toLowerCase();
        const matches = this.current().models.filter(
            (model) =>
                needle === '' ||
                model.name.toLowerCase().includes(needle) ||
                model.description.toLowerCase().includes(needle) ||
                model.tags.some((tag) => tag.toLowerCase().includes(needle))
        );
        return structuredClone(matches);
    }

    /**
     * Write a catalog to the override path. Takes effect on the next `load()`.
     */
    async saveOverride(catalog: Catalog): Promise<void> {
        try {
            await fs.mkdir(path.dirname(this.overridePath), { recursive: true });
            await fs.writeFile(this.overridePath, JSON.stringify(catalog, null, 2), 'utf-8');
        } catch (error) {
            throw CatalogError.overrideWriteFailed(this.overridePath, errorMessage(error));
        }
    }

    /**
     * Fire-and-forget refresh. Errors only reach the log.
     */
    scheduleRefresh(): void {
        void this.refresh();
    }

    /**
     * Fetch the remote catalog and store it as the override.
     * The in-memory catalog is left untouched. Never rejects.
     *
     * @returns whether a new override was written
     */
    refresh(): Promise<boolean> {
        if (!this.refreshPromise) {
            this.refreshPromise = this.refreshInternal()
                .catch((error: unknown) => {
                    this.options.logger.debug(`Catalog refresh skipped: ${errorMessage(error)}`);
                    return false;
                })
                .finally(() => {
                    this.refreshPromise = null;
                });
        }
        return this.refreshPromise;
    }

    private async refreshInternal(): Promise<boolean> {
        const { remoteUrl, refreshTimeoutMs, userAgent, logger } = this.options;
        if (!remoteUrl) {
            logger.debug('No remote catalog configured; refresh disabled');
            return false;
        }

        let response: Response;
        try {
            response = await fetch(remoteUrl, {
                headers: { 'User-Agent': userAgent, Accept: 'application/json' },
                signal: AbortSignal.timeout(refreshTimeoutMs),
            });
        } catch (error) {
            throw CatalogError.refreshFailed(remoteUrl, errorMessage(error));
        }
        if (!response.ok) {
            throw CatalogError.refreshFailed(
                remoteUrl,
                `HTTP ${response.status}: ${response.statusText}`
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw CatalogError.refreshInvalid(remoteUrl, errorMessage(error));
        }
        const parsed = CatalogSchema.safeParse(body);
        if (!parsed.success) {
            throw CatalogError.refreshInvalid(remoteUrl, parsed.error.message);
        }

        await this.saveOverride(parsed.data);
        logger.debug(`Catalog override refreshed from ${remoteUrl}`, {
            models: parsed.data.models.length,
        });
        return true;
    }

    private current(): Catalog {
        if (!this.catalog) {
            throw CatalogError.notLoaded();
        }
        return this.catalog;
    }

    private async readBundled(): Promise<Catalog> {
        let raw: string;
        try {
            raw = await fs.readFile(this.bundledPath, 'utf-8');
        } catch (error) {
            throw CatalogError.bundledInvalid(this.bundledPath, errorMessage(error));
        }
        const parsed = parseCatalog(raw);
        if (!parsed.ok) {
            throw CatalogError.bundledInvalid(this.bundledPath, parsed.reason);
        }
        return parsed.catalog;
    }

    private async readOverride(): Promise<Catalog | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.overridePath, 'utf-8');
        } catch (error) {
            if (!isNotFound(error)) {
                this.options.logger.warn(
                    `Could not read catalog override ${this.overridePath}: ${errorMessage(error)}`
                );
            }
            return null;
        }

        const parsed = parseCatalog(raw);
        if (!parsed.ok) {
            const warning = CatalogError.overrideInvalid(this.overridePath, parsed.reason);
            this.options.logger.warn(warning.message, { code: warning.code });
            return null;
        }
        return parsed.catalog;
    }
}

type ParseOutcome = { ok: true; catalog: Catalog } | { ok: false; reason: string };

function parseCatalog(raw: string): ParseOutcome {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        return { ok: false, reason: errorMessage(error) };
    }
    const result = CatalogSchema.safeParse(json);
    if (!result.success) {
        return { ok: false, reason: result.error.message };
    }
    return { ok: true, catalog: result.data };
}
