import { describe, it, expect, vi } from 'vitest';
import { DownloadSession } from '../acquisition/session.js';
import { createMockLogger } from '../logger/test-utils.js';
import type { LocalModelsStore } from '../storage/local-models-store.js';
import { StatusPoller } from './status-poller.js';

function createHarness(sessions: DownloadSession[], rescanOnComplete = false) {
    const live = [...sessions];
    const manager = {
        list: () => [...live],
        drop: vi.fn((modelId: string) => {
            const index = live.findIndex((session) => session.modelId === modelId);
            if (index === -1) return false;
            live.splice(index, 1);
            return true;
        }),
        hasActive: () => live.some((session) => session.active),
    };
    const store = {
        setStatus: vi.fn<LocalModelsStore['setStatus']>(),
        refresh: vi.fn<LocalModelsStore['refresh']>(),
    };
    const logger = createMockLogger();
    const poller = new StatusPoller({ manager, store, logger, rescanOnComplete });
    return { poller, manager, store, logger, live };
}

function activeSession(modelId: string): DownloadSession {
    const session = new DownloadSession(modelId);
    session.begin();
    session.setListing(100, 1);
    session.setCurrentFile(0, 'model.bin');
    session.setTransferred(25);
    return session;
}

describe('StatusPoller', () => {
    it('reports progress and keeps polling while a session runs', async () => {
        const { poller, store } = createHarness([activeSession('m1')]);

        const result = await poller.tick();

        expect(result.keepPolling).toBe(true);
        expect(result.concluded).toEqual([]);
        expect(result.progress).toHaveLength(1);
        expect(result.progress[0]).toMatchObject({
            modelId: 'm1',
            fraction: 0.25,
            text: '25.0%  (25.0 B / 100.0 B)  model.bin [1/1]',
        });
        expect(store.setStatus).not.toHaveBeenCalled();
    });

    it('marks completed models ready and drops the session', async () => {
        const session = activeSession('m1');
        session.markCompleted();
        const { poller, store, manager } = createHarness([session]);

        const result = await poller.tick();

        expect(store.setStatus).toHaveBeenCalledWith('m1', 'ready');
        expect(store.refresh).not.toHaveBeenCalled();
        expect(manager.drop).toHaveBeenCalledWith('m1');
        expect(result).toEqual({
            progress: [],
            concluded: [{ modelId: 'm1', outcome: 'completed' }],
            keepPolling: false,
        });
    });

    it('rescans after completion when configured to', async () => {
        const session = activeSession('m1');
        session.markCompleted();
        const { poller, store } = createHarness([session], true);

        await poller.tick();

        expect(store.refresh).toHaveBeenCalledWith('m1');
    });

    it('records failures with the session message', async () => {
        const session = activeSession('m2');
        session.markFailed('No files in repository https://models.example.com/org/empty');
        const { poller, store, live } = createHarness([session]);

        const result = await poller.tick();

        expect(store.setStatus).toHaveBeenCalledWith(
            'm2',
            'error',
            'No files in repository https://models.example.com/org/empty'
        );
        expect(result.concluded).toEqual([
            {
                modelId: 'm2',
                outcome: 'failed',
                errorMessage: 'No files in repository https://models.example.com/org/empty',
            },
        ]);
        expect(live).toEqual([]);
    });

    it('reconciles cancelled sessions from disk', async () => {
        const session = activeSession('m3');
        session.requestCancel();
        session.markCancelled();
        const { poller, store } = createHarness([session]);

        const result = await poller.tick();

        expect(store.refresh).toHaveBeenCalledWith('m3');
        expect(store.setStatus).not.toHaveBeenCalled();
        expect(result.concluded).toEqual([{ modelId: 'm3', outcome: 'cancelled' }]);
    });

    it('still drops a session whose status could not be written', async () => {
        const session = activeSession('m4');
        session.markCompleted();
        const { poller, store, logger, live } = createHarness([session, activeSession('m5')]);
        store.setStatus.mockRejectedValueOnce(new Error('EACCES'));

        const result = await poller.tick();

        expect(logger.error).toHaveBeenCalledWith('Could not record completed for m4: EACCES');
        expect(live.map((s) => s.modelId)).toEqual(['m5']);
        expect(result.keepPolling).toBe(true);
    });

    it('leaves idle sessions alone', async () => {
        const { poller, manager } = createHarness([new DownloadSession('m6')]);

        const result = await poller.tick();

        expect(manager.drop).not.toHaveBeenCalled();
        expect(result).toEqual({ progress: [], concluded: [], keepPolling: false });
    });
});
