import { AcquisitionError } from './errors.js';

export type SessionOutcome = 'idle' | 'active' | 'completed' | 'failed' | 'cancelled';

/**
 * Consistent read of every session field, taken in one synchronous step
 */
export interface SessionSnapshot {
    readonly modelId: string;
    readonly active: boolean;
    readonly cancelRequested: boolean;
    readonly completed: boolean;
    readonly failed: boolean;
    readonly bytesTransferred: number;
    /** 0 while unknown */
    readonly bytesTotal: number;
    readonly currentFileIndex: number;
    readonly totalFiles: number;
    readonly currentFile: string;
    readonly errorMessage: string;
    readonly outcome: SessionOutcome;
}

/**
 * Mutable state of one model acquisition.
 *
 * The control side only reads (`snapshot`, getters) and requests cancellation;
 * the worker is the only writer of counters and outcome flags. Both run on the
 * same event loop, so every field update is observed whole.
 *
 * Lifecycle: idle → active → completed | failed | cancelled. A terminal session
 * is reused for a retry only through `reset()`.
 */
export class DownloadSession {
    private _active = false;
    private _cancelRequested = false;
    private _completed = false;
    private _failed = false;
    private _bytesTransferred = 0;
    private _bytesTotal = 0;
    private _currentFileIndex = 0;
    private _totalFiles = 0;
    private _currentFile = '';
    private _errorMessage = '';
    private controller = new AbortController();
    private settled: Promise<void> = Promise.resolve();
    private resolveSettled: () => void = () => {};

    constructor(readonly modelId: string) {}

    get active(): boolean {
        return this._active;
    }

    get cancelRequested(): boolean {
        return this._cancelRequested;
    }

    get completed(): boolean {
        return this._completed;
    }

    get failed(): boolean {
        return this._failed;
    }

    get bytesTransferred(): number {
        return this._bytesTransferred;
    }

    get bytesTotal(): number {
        return this._bytesTotal;
    }

    get errorMessage(): string {
        return this._errorMessage;
    }

    /** Aborted when cancellation is requested */
    get signal(): AbortSignal {
        return this.controller.signal;
    }

    /**
     * Cancelled is derived: requested, stopped, and neither outcome flag set
     */
    get outcome(): SessionOutcome {
        if (this._active) return 'active';
        if (this._completed) return 'completed';
        if (this._failed) return 'failed';
        if (this._cancelRequested) return 'cancelled';
        return 'idle';
    }

    snapshot(): SessionSnapshot {
        return Object.freeze({
            modelId: this.modelId,
            active: this._active,
            cancelRequested: this._cancelRequested,
            completed: this._completed,
            failed: this._failed,
            bytesTransferred: this._bytesTransferred,
            bytesTotal: this._bytesTotal,
            currentFileIndex: this._currentFileIndex,
            totalFiles: this._totalFiles,
            currentFile: this._currentFile,
            errorMessage: this._errorMessage,
            outcome: this.outcome,
        });
    }

    /**
     * Resolves once the session leaves the active state
     */
    whenSettled(): Promise<void> {
        return this.settled;
    }

    /**
     * Move from idle to active
     *
     * @throws VaultRuntimeError if the session is active or terminal (reset first)
     */
    begin(): void {
        if (this.outcome !== 'idle') {
            throw AcquisitionError.sessionActive(this.modelId);
        }
        this._active = true;
        this.settled = new Promise<void>((resolve) => {
            this.resolveSettled = resolve;
        });
    }

    /**
     * Zero every field so the session can run again.
     *
     * @throws VaultRuntimeError while the worker is still running
     */
    reset(): void {
        if (this._active) {
            throw AcquisitionError.sessionActive(this.modelId);
        }
        this._cancelRequested = false;
        this._completed = false;
        this._failed = false;
        this._bytesTransferred = 0;
        this._bytesTotal = 0;
        this._currentFileIndex = 0;
        this._totalFiles = 0;
        this._currentFile = '';
        this._errorMessage = '';
        this.controller = new AbortController();
        this.settled = Promise.resolve();
    }

    /**
     * Ask the worker to stop at its next checkpoint.
     *
     * @returns false when there is nothing to cancel
     */
    requestCancel(): boolean {
        if (!this._active) {
            return false;
        }
        this._cancelRequested = true;
        this.controller.abort();
        return true;
    }

    // Worker-side updates

    /**
     * Start (or restart, for a new candidate) progress accounting
     */
    setListing(bytesTotal: number, totalFiles: number): void {
        this._bytesTotal = bytesTotal;
        this._totalFiles = totalFiles;
        this._bytesTransferred = 0;
        this._currentFileIndex = 0;
        this._currentFile = '';
    }

    setCurrentFile(index: number, filePath: string): void {
        this._currentFileIndex = index;
        this._currentFile = filePath;
    }

    /**
     * Clamped to the known total so progress never exceeds 100%
     */
    setTransferred(bytes: number): void {
        this._bytesTransferred =
            this._bytesTotal > 0 ? Math.min(bytes, this._bytesTotal) : Math.max(0, bytes);
    }

    markCompleted(): void {
        if (!this._active) return;
        this._completed = true;
        this.finish();
    }

    markFailed(message: string): void {
        if (!this._active) return;
        this._errorMessage = message;
        this._failed = true;
        this.finish();
    }

    /**
     * Stop without an outcome flag; `outcome` reports 'cancelled'
     */
    markCancelled(): void {
        if (!this._active) return;
        this._cancelRequested = true;
        this.finish();
    }

    private finish(): void {
        this._currentFile = '';
        this._active = false;
        this.resolveSettled();
    }
}
