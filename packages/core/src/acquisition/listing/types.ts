import type { Logger } from '../../logger/types.js';

/**
 * One file belonging to a model, as reported by the host
 */
export interface RemoteFile {
    /** Path relative to the model root, `/`-separated */
    path: string;
    /** Size in bytes, 0 when the host does not report it */
    size: number;
    downloadUrl: string;
}

export interface ListRequest {
    /** Candidate URL (primary or a mirror) */
    url: string;
    revision: string;
    token?: string | undefined;
    signal?: AbortSignal | undefined;
}

export interface RemoteFileLister {
    /**
     * @throws VaultRuntimeError on network/format failures and on an empty listing
     */
    list(request: ListRequest): Promise<RemoteFile[]>;
}

export interface ListerOptions {
    userAgent: string;
    /** Timeout per listing request */
    timeoutMs: number;
    logger: Logger;
}
