import { promises as fs } from 'fs';
import * as path from 'path';
import type { ModelEntry } from '../catalog/types.js';
import { expandHome } from '../config/paths.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { isErrnoException, pathExists } from '../utils/fs.js';
import { StorageError } from '../storage/errors.js';

export type DiskState = 'not_downloaded' | 'downloaded';

export interface DiskScan {
    state: DiskState;
    /** Visible top-level entries */
    files: number;
    /** Total size of visible entries, subdirectories included */
    bytes: number;
}

const EMPTY_SCAN: DiskScan = { state: 'not_downloaded', files: 0, bytes: 0 };

function isVisible(name: string): boolean {
    return !name.startsWith('.');
}

/**
 * A directory counts as downloaded once it holds at least one entry whose
 * name does not start with a dot. Missing directories are not downloaded.
 */
export async function inspectModelDirectory(directory: string, logger?: Logger): Promise<DiskScan> {
    let names: string[];
    try {
        names = await fs.readdir(directory);
    } catch (error) {
        const absent = isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
        if (!absent) {
            logger?.warn(`Could not scan ${directory}: ${errorMessage(error)}`);
        }
        return { ...EMPTY_SCAN };
    }

    const visible = names.filter(isVisible);
    if (visible.length === 0) {
        return { ...EMPTY_SCAN };
    }
    let bytes = 0;
    for (const name of visible) {
        bytes += await entrySize(path.join(directory, name), logger);
    }
    return { state: 'downloaded', files: visible.length, bytes };
}

async function entrySize(target: string, logger?: Logger): Promise<number> {
    try {
        const stats = await fs.stat(target);
        if (!stats.isDirectory()) {
            return stats.size;
        }
        let total = 0;
        for (const name of (await fs.readdir(target)).filter(isVisible)) {
            total += await entrySize(path.join(target, name), logger);
        }
        return total;
    } catch (error) {
        logger?.debug(`Could not size ${target}: ${errorMessage(error)}`);
        return 0;
    }
}

export function scanModel(entry: ModelEntry, logger?: Logger): Promise<DiskScan> {
    return inspectModelDirectory(expandHome(entry.storage.localPath), logger);
}

/**
 * Delete a model's install directory.
 *
 * @returns false when there was nothing to delete
 * @throws VaultRuntimeError when the directory exists but cannot be removed
 */
export async function removeModelFiles(entry: ModelEntry): Promise<boolean> {
    const directory = expandHome(entry.storage.localPath);
    if (!(await pathExists(directory))) {
        return false;
    }
    try {
        await fs.rm(directory, { recursive: true, force: true });
    } catch (error) {
        throw StorageError.removeFailed(entry.id, directory, errorMessage(error));
    }
    return true;
}
