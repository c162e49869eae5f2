import { AcquisitionError } from './errors.js';

export interface RepositoryRef {
    /** Scheme and host of the candidate, e.g. `https://huggingface.co` */
    origin: string;
    /** `{organization}/{repository}` */
    repoId: string;
}

export type RepositoryLayout = 'tree' | 'recursive';

/**
 * Extract host and repository id from a candidate URL.
 *
 * Tree-style hosts put the id in the first two path segments
 * (`https://host/org/repo`); recursive-style hosts prefix it with `models/`
 * (`https://host/models/org/repo`), which is also accepted without the prefix.
 */
export function parseRepositoryUrl(url: string, layout: RepositoryLayout): RepositoryRef {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw AcquisitionError.invalidRepositoryUrl(url);
    }

    let segments = parsed.pathname.split('/').filter((segment) => segment.length > 0);
    if (layout === 'recursive' && segments[0] === 'models') {
        segments = segments.slice(1);
    }

    const [organization, repository] = segments;
    if (!organization || !repository) {
        throw AcquisitionError.invalidRepositoryUrl(url);
    }
    return { origin: parsed.origin, repoId: `${organization}/${repository}` };
}

/**
 * Percent-encode each segment of a relative path, keeping the separators
 */
export function encodePath(relativePath: string): string {
    return relativePath.split('/').map(encodeURIComponent).join('/');
}
