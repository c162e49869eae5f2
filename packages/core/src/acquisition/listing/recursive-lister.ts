import { z } from 'zod';
import { AcquisitionError } from '../errors.js';
import { getJson } from '../http.js';
import { parseRepositoryUrl } from '../repository.js';
import type { RepositoryRef } from '../repository.js';
import { finalizeListing } from './filters.js';
import type { ListRequest, ListerOptions, RemoteFile, RemoteFileLister } from './types.js';

const RecursiveResponseSchema = z.object({
    Code: z.number(),
    Message: z.string().optional(),
    Data: z
        .object({
            Files: z
                .array(
                    z.object({
                        Path: z.string().min(1),
                        Size: z.number().nonnegative().optional(),
                        Type: z.string(),
                    })
                )
                .default([]),
        })
        .optional(),
});

/**
 * Lister for hosts exposing
 * `GET {host}/api/v1/models/{repo}/repo/files?Revision={rev}[&Root={subpath}]`.
 *
 * `tree` entries are expanded with a further call scoped to that path.
 */
export class RecursiveApiLister implements RemoteFileLister {
    constructor(private readonly options: ListerOptions) {}

    async list(request: ListRequest): Promise<RemoteFile[]> {
        const repo = parseRepositoryUrl(request.url, 'recursive');
        const files = finalizeListing(await this.listRoot(repo, request, '', new Set()));
        if (files.length === 0) {
            throw AcquisitionError.emptyListing(request.url);
        }
        this.options.logger.debug(`Listed ${files.length} files for ${repo.repoId}`, {
            origin: repo.origin,
        });
        return files;
    }

    private async listRoot(
        repo: RepositoryRef,
        request: ListRequest,
        root: string,
        visited: Set<string>
    ): Promise<RemoteFile[]> {
        visited.add(root);
        const revision = encodeURIComponent(request.revision);
        const url =
            `${repo.origin}/api/v1/models/${repo.repoId}/repo/files?Revision=${revision}` +
            (root ? `&Root=${encodeURIComponent(root)}` : '');

        const body = await getJson(url, {
            userAgent: this.options.userAgent,
            timeoutMs: this.options.timeoutMs,
            token: request.token,
            signal: request.signal,
        });
        const parsed = RecursiveResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw AcquisitionError.malformedResponse(url, parsed.error.message);
        }
        if (parsed.data.Code !== 200) {
            throw AcquisitionError.malformedResponse(
                url,
                `Code ${parsed.data.Code}${parsed.data.Message ? `: ${parsed.data.Message}` : ''}`
            );
        }

        const files: RemoteFile[] = [];
        for (const entry of parsed.data.Data?.Files ?? []) {
            if (entry.Type === 'tree') {
                if (!visited.has(entry.Path)) {
                    files.push(...(await this.listRoot(repo, request, entry.Path, visited)));
                }
            } else if (entry.Type === 'blob') {
                files.push({
                    path: entry.Path,
                    size: entry.Size ?? 0,
                    downloadUrl:
                        `${repo.origin}/api/v1/models/${repo.repoId}/repo` +
                        `?Revision=${revision}&FilePath=${encodeURIComponent(entry.Path)}`,
                });
            }
        }
        return files;
    }
}
