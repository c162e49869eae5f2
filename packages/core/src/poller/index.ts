export { describeProgress, progressFraction, toProgressView } from './progress.js';
export type { ProgressView } from './progress.js';
export { StatusPoller } from './status-poller.js';
export type {
    ConcludedSession,
    ConclusionOutcome,
    PollResult,
    StatusPollerOptions,
} from './status-poller.js';
