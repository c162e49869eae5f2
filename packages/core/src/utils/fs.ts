import { promises as fs } from 'fs';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

export function isNotFound(error: unknown): boolean {
    return isErrnoException(error) && error.code === 'ENOENT';
}

export async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}
