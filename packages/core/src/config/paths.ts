import * as path from 'path';
import { homedir } from 'os';

/** Default per-user data directory, kept home-relative until use */
export const DEFAULT_DATA_DIR = '~/.modelvault';

/**
 * Expand a leading `~` against the current user's home directory.
 * Resolution happens at call time so `HOME` changes (tests, sudo) are honored.
 */
export function expandHome(target: string): string {
    if (target === '~') {
        return homedir();
    }
    if (target.startsWith('~/')) {
        return path.join(homedir(), target.slice(2));
    }
    return target;
}
