import { z } from 'zod';
import { AcquisitionError } from '../errors.js';
import { getJson } from '../http.js';
import { encodePath, parseRepositoryUrl } from '../repository.js';
import type { RepositoryRef } from '../repository.js';
import { finalizeListing } from './filters.js';
import type { ListRequest, ListerOptions, RemoteFile, RemoteFileLister } from './types.js';

const TreeItemSchema = z.object({
    type: z.string(),
    path: z.string().min(1),
    size: z.number().nonnegative().optional(),
});

const TreeResponseSchema = z.array(TreeItemSchema);

/**
 * Lister for hosts exposing `GET {host}/api/models/{repo}/tree/{revision}[/{subpath}]`.
 *
 * Each call returns the immediate children of one directory; directories are
 * listed depth-first in the order the host returns them.
 */
export class TreeApiLister implements RemoteFileLister {
    constructor(private readonly options: ListerOptions) {}

    async list(request: ListRequest): Promise<RemoteFile[]> {
        const repo = parseRepositoryUrl(request.url, 'tree');
        const files = finalizeListing(await this.listDirectory(repo, request, ''));
        if (files.length === 0) {
            throw AcquisitionError.emptyListing(request.url);
        }
        this.options.logger.debug(`Listed ${files.length} files for ${repo.repoId}`, {
            origin: repo.origin,
        });
        return files;
    }

    private async listDirectory(
        repo: RepositoryRef,
        request: ListRequest,
        prefix: string
    ): Promise<RemoteFile[]> {
        const revision = encodeURIComponent(request.revision);
        const url =
            `${repo.origin}/api/models/${repo.repoId}/tree/${revision}` +
            (prefix ? `/${encodePath(prefix)}` : '');

        const body = await getJson(url, {
            userAgent: this.options.userAgent,
            timeoutMs: this.options.timeoutMs,
            token: request.token,
            signal: request.signal,
        });
        const parsed = TreeResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw AcquisitionError.malformedResponse(url, parsed.error.message);
        }

        const files: RemoteFile[] = [];
        for (const item of parsed.data) {
            if (item.type === 'directory') {
                if (item.path === prefix) {
                    continue;
                }
                files.push(...(await this.listDirectory(repo, request, item.path)));
            } else if (item.type === 'file') {
                files.push({
                    path: item.path,
                    size: item.size ?? 0,
                    downloadUrl: `${repo.origin}/${repo.repoId}/resolve/${revision}/${encodePath(item.path)}`,
                });
            }
        }
        return files;
    }
}
