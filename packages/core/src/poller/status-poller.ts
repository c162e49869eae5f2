import type { DownloadManager } from '../acquisition/manager.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import type { LocalModelsStore } from '../storage/local-models-store.js';
import { toProgressView } from './progress.js';
import type { ProgressView } from './progress.js';

export type ConclusionOutcome = 'completed' | 'failed' | 'cancelled';

export interface ConcludedSession {
    modelId: string;
    outcome: ConclusionOutcome;
    errorMessage?: string;
}

export interface PollResult {
    /** One view per session still running */
    progress: ProgressView[];
    /** Sessions that finished since the last tick; already dropped */
    concluded: ConcludedSession[];
    /** True while any session is active; schedule another tick */
    keepPolling: boolean;
}

export interface StatusPollerOptions {
    manager: Pick<DownloadManager, 'list' | 'drop' | 'hasActive'>;
    store: Pick<LocalModelsStore, 'setStatus' | 'refresh'>;
    logger: Logger;
    /** Rescan the model directory after a successful download */
    rescanOnComplete?: boolean;
}

/**
 * Pull-based bridge from download sessions to persisted model status.
 * Workers never notify; the UI calls `tick()` on its own schedule.
 */
export class StatusPoller {
    constructor(private readonly options: StatusPollerOptions) {}

    async tick(): Promise<PollResult> {
        const { manager } = this.options;
        const progress: ProgressView[] = [];
        const concluded: ConcludedSession[] = [];

        for (const session of manager.list()) {
            const snapshot = session.snapshot();
            switch (snapshot.outcome) {
                case 'active':
                    progress.push(toProgressView(snapshot));
                    break;
                case 'completed':
                case 'failed':
                case 'cancelled':
                    await this.conclude(snapshot.modelId, snapshot.outcome, snapshot.errorMessage);
                    manager.drop(snapshot.modelId);
                    concluded.push(
                        snapshot.outcome === 'failed'
                            ? { modelId: snapshot.modelId, outcome: 'failed', errorMessage: snapshot.errorMessage }
                            : { modelId: snapshot.modelId, outcome: snapshot.outcome }
                    );
                    break;
                case 'idle':
                    break;
            }
        }

        return { progress, concluded, keepPolling: manager.hasActive() };
    }

    private async conclude(modelId: string, outcome: ConclusionOutcome, message: string): Promise<void> {
        const { store, logger, rescanOnComplete = false } = this.options;
        try {
            if (outcome === 'completed') {
                await store.setStatus(modelId, 'ready');
                if (rescanOnComplete) {
                    await store.refresh(modelId);
                }
            } else if (outcome === 'failed') {
                await store.setStatus(modelId, 'error', message);
            } else {
                await store.refresh(modelId);
            }
        } catch (error) {
            logger.error(`Could not record ${outcome} for ${modelId}: ${errorMessage(error)}`);
        }
    }
}
