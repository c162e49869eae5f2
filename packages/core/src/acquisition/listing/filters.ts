import * as path from 'path';
import { AcquisitionError } from '../errors.js';
import type { RemoteFile } from './types.js';

/** Repository metadata such as `.gitattributes` is never downloaded */
export function isHiddenPath(relativePath: string): boolean {
    return relativePath.split('/').some((segment) => segment.startsWith('.'));
}

/**
 * Drop hidden files and later duplicates, keeping listing order.
 *
 * @throws VaultRuntimeError when a path climbs out of the model directory
 */
export function finalizeListing(files: RemoteFile[]): RemoteFile[] {
    const seen = new Set<string>();
    const result: RemoteFile[] = [];
    for (const file of files) {
        const normalized = path.posix.normalize(file.path).replace(/^\/+/, '');
        if (normalized === '..' || normalized.startsWith('../')) {
            throw AcquisitionError.unsafePath(file.path);
        }
        if (isHiddenPath(normalized) || seen.has(normalized)) {
            continue;
        }
        seen.add(normalized);
        result.push({ ...file, path: normalized });
    }
    return result;
}
