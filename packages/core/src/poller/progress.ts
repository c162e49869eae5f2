import type { SessionOutcome, SessionSnapshot } from '../acquisition/session.js';
import { formatSize } from '../utils/format.js';

export interface ProgressView {
    modelId: string;
    outcome: SessionOutcome;
    /** Clamped to [0, 1]; 0 while the total is unknown */
    fraction: number;
    text: string;
    errorMessage: string;
}

export function progressFraction(transferred: number, total: number): number {
    if (total <= 0) {
        return 0;
    }
    return Math.min(1, Math.max(0, transferred / total));
}

/**
 * `"42.0%  (1.0 MB / 2.4 MB)  weights.bin [2/3]"`; the file part only when a
 * current file is set.
 */
export function describeProgress(snapshot: SessionSnapshot): string {
    const fraction = progressFraction(snapshot.bytesTransferred, snapshot.bytesTotal);
    let text =
        `${(fraction * 100).toFixed(1)}%  ` +
        `(${formatSize(snapshot.bytesTransferred)} / ${formatSize(snapshot.bytesTotal)})`;
    if (snapshot.currentFile) {
        // The conversion step reports an index one past the last file
        const position = Math.min(snapshot.currentFileIndex + 1, snapshot.totalFiles);
        text += `  ${snapshot.currentFile} [${position}/${snapshot.totalFiles}]`;
    }
    return text;
}

export function toProgressView(snapshot: SessionSnapshot): ProgressView {
    return {
        modelId: snapshot.modelId,
        outcome: snapshot.outcome,
        fraction: progressFraction(snapshot.bytesTransferred, snapshot.bytesTotal),
        text: describeProgress(snapshot),
        errorMessage: snapshot.errorMessage,
    };
}
