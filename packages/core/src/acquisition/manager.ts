import type { ModelEntry } from '../catalog/types.js';
import type { VaultConfig } from '../config/schemas.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { ConverterRegistry } from './conversion/registry.js';
import { AcquisitionError } from './errors.js';
import { DownloadSession } from './session.js';
import { runDownload } from './worker.js';
import type { WorkerDependencies } from './worker.js';

export interface DownloadManagerOptions {
    config: Pick<VaultConfig, 'userAgent' | 'chunkSize' | 'timeouts' | 'auth'>;
    logger: Logger;
    converters?: ConverterRegistry;
    listerFor?: WorkerDependencies['listerFor'];
}

/**
 * Owns the session map (one session per model id) and starts workers.
 *
 * Sessions stay in the map after they finish so the poller can read their
 * outcome; the poller calls `drop()` once it has acted on it.
 */
export class DownloadManager {
    private readonly sessions = new Map<string, DownloadSession>();
    private readonly deps: WorkerDependencies;
    private readonly logger: Logger;

    constructor(options: DownloadManagerOptions) {
        this.logger = options.logger.createChild(LogComponent.SESSION);
        this.deps = {
            userAgent: options.config.userAgent,
            chunkSize: options.config.chunkSize,
            timeouts: options.config.timeouts,
            auth: options.config.auth,
            converters: options.converters ?? ConverterRegistry.withDefaults(),
            logger: this.logger,
            listerFor: options.listerFor,
        };
    }

    /**
     * Start acquiring a model.
     *
     * An active session for the same id is returned as-is. A finished one is
     * reset and reused. Manual-only sources fail synchronously without any
     * network activity.
     */
    start(entry: ModelEntry): DownloadSession {
        const existing = this.sessions.get(entry.id);
        if (existing?.active) {
            this.logger.debug(`Download of ${entry.id} already running`);
            return existing;
        }

        const session = existing ?? new DownloadSession(entry.id);
        if (existing) {
            existing.reset();
        }
        this.sessions.set(entry.id, session);
        session.begin();

        // The worker gets its own copy; catalog reloads cannot affect it
        const job = structuredClone(entry);
        const source = job.source;
        if (source.kind === 'manual-only') {
            const error = AcquisitionError.unsupportedSource(job.id, source.instructions, source.url);
            this.logger.info(error.message, { modelId: job.id });
            session.markFailed(error.message);
            return session;
        }

        this.logger.info(`Starting download of ${job.id}`, {
            kind: source.kind,
            candidates: 1 + source.backupUrls.length,
        });
        runDownload(session, job, source, this.deps).catch((error: unknown) => {
            if (error instanceof Error) {
                this.logger.trackException(error, { modelId: job.id });
            } else {
                this.logger.error(`Worker for ${job.id} crashed: ${errorMessage(error)}`);
            }
            session.markFailed(errorMessage(error));
        });
        return session;
    }

    /**
     * @returns false when no active session exists for the id
     */
    cancel(modelId: string): boolean {
        const requested = this.sessions.get(modelId)?.requestCancel() ?? false;
        if (requested) {
            this.logger.info(`Cancellation requested for ${modelId}`);
        }
        return requested;
    }

    get(modelId: string): DownloadSession | undefined {
        return this.sessions.get(modelId);
    }

    list(): DownloadSession[] {
        return [...this.sessions.values()];
    }

    hasActive(): boolean {
        return this.list().some((session) => session.active);
    }

    /**
     * Forget a finished session. Active sessions are kept.
     */
    drop(modelId: string): boolean {
        const session = this.sessions.get(modelId);
        if (!session || session.active) {
            return false;
        }
        return this.sessions.delete(modelId);
    }

    /**
     * Cancel everything and wait for workers to stop
     */
    async shutdown(): Promise<void> {
        const running = this.list().filter((session) => session.active);
        for (const session of running) {
            session.requestCancel();
        }
        await Promise.all(running.map((session) => session.whenSettled()));
    }
}
