import * as path from 'path';
import { AcquisitionError } from '../errors.js';
import type { ListRequest, RemoteFile, RemoteFileLister } from './types.js';

/**
 * Each candidate URL is one file. No request is made; size stays unknown.
 */
export class DirectUrlLister implements RemoteFileLister {
    async list(request: ListRequest): Promise<RemoteFile[]> {
        let parsed: URL;
        try {
            parsed = new URL(request.url);
        } catch {
            throw AcquisitionError.invalidRepositoryUrl(request.url);
        }
        const name = decodeURIComponent(path.posix.basename(parsed.pathname));
        if (!name || name.startsWith('.')) {
            throw AcquisitionError.emptyListing(request.url);
        }
        return [{ path: name, size: 0, downloadUrl: request.url }];
    }
}
