// Session and manager
export { DownloadSession } from './session.js';
export type { SessionOutcome, SessionSnapshot } from './session.js';
export { DownloadManager } from './manager.js';
export type { DownloadManagerOptions } from './manager.js';
export { runDownload, resolveInside } from './worker.js';
export type { WorkerDependencies } from './worker.js';

// Transfer
export { fetchToFile } from './fetcher.js';
export type { FetchFileOptions } from './fetcher.js';
export { resolveAuthToken } from './auth.js';
export { parseRepositoryUrl } from './repository.js';
export type { RepositoryRef } from './repository.js';
export * from './listing/index.js';
export * from './conversion/index.js';

// Errors
export { AcquisitionError, isCancellation } from './errors.js';
export { AcquisitionErrorCode } from './error-codes.js';
