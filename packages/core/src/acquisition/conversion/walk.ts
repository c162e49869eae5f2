import { promises as fs } from 'fs';
import * as path from 'path';

/**
 * Relative paths of every regular file under `root`, depth-first, sorted per directory
 */
export async function listFilesRecursive(root: string, prefix = ''): Promise<string[]> {
    const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const files: string[] = [];
    for (const entry of entries) {
        const relative = prefix ? path.join(prefix, entry.name) : entry.name;
        if (entry.isDirectory()) {
            files.push(...(await listFilesRecursive(root, relative)));
        } else if (entry.isFile()) {
            files.push(relative);
        }
    }
    return files;
}
