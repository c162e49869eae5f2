import type { DownloadSession } from '../acquisition/session.js';
import { DownloadManager } from '../acquisition/manager.js';
import type { ConverterRegistry } from '../acquisition/conversion/registry.js';
import { AcquisitionError } from '../acquisition/errors.js';
import type { WorkerDependencies } from '../acquisition/worker.js';
import { CatalogStore } from '../catalog/store.js';
import type { ModelCategory, ModelEntry } from '../catalog/types.js';
import { resolveVaultConfig } from '../config/resolver.js';
import type { VaultConfig, VaultConfigInput } from '../config/schemas.js';
import { errorMessage } from '../errors/runtime-error.js';
import { createLogger } from '../logger/factory.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { StatusPoller } from '../poller/status-poller.js';
import type { PollResult } from '../poller/status-poller.js';
import { LocalModelsStore } from '../storage/local-models-store.js';
import type { LocalModel } from '../storage/schemas.js';
import { VaultEngineError } from './errors.js';

export interface ModelVaultOptions {
    /** Explicit settings, applied over environment variables */
    config?: VaultConfigInput;
    env?: NodeJS.ProcessEnv;
    /** Use this logger instead of building one from config */
    logger?: Logger;
    /** Alternate bundled catalog document */
    bundledCatalogPath?: string;
    converters?: ConverterRegistry;
    listerFor?: WorkerDependencies['listerFor'];
}

/**
 * Engine entry point.
 *
 * Wires configuration, logging, the catalog, the installed-models document,
 * the download manager and the status poller. `init()` must complete before
 * anything else is called.
 *
 * @example
 * ```typescript
 * const vault = new ModelVault();
 * await vault.init();
 * vault.download('whisper-base-en');
 * while ((await vault.poll()).keepPolling) {
 *     await sleep(250);
 * }
 * ```
 */
export class ModelVault {
    public readonly config: VaultConfig;
    public readonly logger: Logger;
    public readonly catalog: CatalogStore;
    public readonly localModels: LocalModelsStore;
    public readonly downloads: DownloadManager;
    private readonly poller: StatusPoller;

    private _isStarted = false;
    private _isStopped = false;

    constructor(options: ModelVaultOptions = {}) {
        this.config = resolveVaultConfig(options.config, options.env);
        this.logger =
            options.logger ?? createLogger({ config: this.config.logger, component: LogComponent.ENGINE });

        this.catalog = new CatalogStore({
            overridePath: this.config.catalogOverridePath,
            remoteUrl: this.config.remoteCatalogUrl,
            refreshTimeoutMs: this.config.timeouts.catalogRefreshMs,
            userAgent: this.config.userAgent,
            logger: this.logger.createChild(LogComponent.CATALOG),
            bundledPath: options.bundledCatalogPath,
        });
        this.localModels = new LocalModelsStore({
            filePath: this.config.localModelsPath,
            logger: this.logger.createChild(LogComponent.STORAGE),
        });
        this.downloads = new DownloadManager({
            config: this.config,
            logger: this.logger,
            converters: options.converters,
            listerFor: options.listerFor,
        });
        this.poller = new StatusPoller({
            manager: this.downloads,
            store: this.localModels,
            logger: this.logger.createChild(LogComponent.POLLER),
            rescanOnComplete: true,
        });
    }

    /**
     * Load the catalog, reconcile installed models from disk and start a
     * background catalog refresh.
     *
     * @throws VaultRuntimeError if already started or the bundled catalog is invalid
     */
    public async init(): Promise<void> {
        if (this._isStopped) {
            throw VaultEngineError.stopped();
        }
        if (this._isStarted) {
            throw VaultEngineError.alreadyStarted();
        }

        const catalog = await this.catalog.load();
        await this.localModels.load(catalog);
        this.catalog.scheduleRefresh();

        this._isStarted = true;
        this.logger.debug('ModelVault started', { dataDir: this.config.dataDir });
    }

    public isStarted(): boolean {
        return this._isStarted;
    }

    /**
     * Start (or join) the download of a catalog model.
     * The returned session concludes asynchronously; call `poll()` to record it.
     *
     * @throws VaultRuntimeError when the id is not in the catalog
     */
    public async download(modelId: string): Promise<DownloadSession> {
        this.ensureStarted();
        const entry = this.catalog.require(modelId);

        const session = this.downloads.start(entry);
        if (session.active) {
            await this.localModels.setStatus(modelId, 'downloading');
        }
        return session;
    }

    /**
     * @returns false when the model has no running download
     */
    public cancel(modelId: string): boolean {
        this.ensureStarted();
        return this.downloads.cancel(modelId);
    }

    /**
     * Delete a model's files and reconcile its status from disk
     *
     * @throws VaultRuntimeError while a download of the model is running
     */
    public async remove(modelId: string): Promise<LocalModel> {
        this.ensureStarted();
        if (this.downloads.get(modelId)?.active) {
            throw AcquisitionError.sessionActive(modelId);
        }
        this.downloads.drop(modelId);
        return this.localModels.remove(modelId);
    }

    public async poll(): Promise<PollResult> {
        this.ensureStarted();
        return this.poller.tick();
    }

    public listModels(category?: ModelCategory): LocalModel[] {
        this.ensureStarted();
        const models = this.localModels.list();
        return category ? models.filter((model) => model.category === category) : models;
    }

    public listInstalled(): LocalModel[] {
        return this.listModels().filter((model) => model.status.state === 'ready');
    }

    public getModel(modelId: string): LocalModel | undefined {
        this.ensureStarted();
        return this.localModels.get(modelId);
    }

    public search(query: string): ModelEntry[] {
        this.ensureStarted();
        return this.catalog.search(query);
    }

    /**
     * Fetch the remote catalog into the override document.
     * Takes effect on the next `init()`.
     */
    public refreshCatalog(): Promise<boolean> {
        return this.catalog.refresh();
    }

    /**
     * Cancel running downloads, record their outcome and flush the logger.
     * The vault cannot be restarted afterwards.
     */
    public async shutdown(): Promise<void> {
        if (this._isStopped) {
            return;
        }
        if (this._isStarted) {
            await this.downloads.shutdown();
            try {
                await this.poller.tick();
            } catch (error) {
                this.logger.warn(`Could not record final download states: ${errorMessage(error)}`);
            }
        }
        this._isStarted = false;
        this._isStopped = true;
        await this.logger.destroy();
    }

    private ensureStarted(): void {
        if (this._isStopped) {
            throw VaultEngineError.stopped();
        }
        if (!this._isStarted) {
            throw VaultEngineError.notStarted();
        }
    }
}
