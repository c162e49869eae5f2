import * as path from 'path';
import { homedir } from 'os';
import dotenv from 'dotenv';

export interface EnvironmentSources {
    /** Directory searched for a project `.env` */
    cwd?: string;
    /** Home directory holding `.modelvault/.env` */
    home?: string;
    /** Shell environment; always wins */
    shell?: NodeJS.ProcessEnv;
}

/**
 * Multi-layer environment variable loading.
 * Priority, highest first:
 * 1. Shell environment
 * 2. `.env` in the working directory
 * 3. Global `~/.modelvault/.env`
 *
 * Missing files contribute nothing.
 */
export function loadEnvironmentVariables(sources: EnvironmentSources = {}): Record<string, string> {
    const { cwd = process.cwd(), home = homedir(), shell = process.env } = sources;
    const env: Record<string, string> = {};

    for (const envPath of [path.join(home, '.modelvault', '.env'), path.join(cwd, '.env')]) {
        const result = dotenv.config({ path: envPath, processEnv: {} });
        if (result.parsed) {
            Object.assign(env, result.parsed);
        }
    }

    for (const [key, value] of Object.entries(shell)) {
        if (value !== undefined && value !== '') {
            env[key] = value;
        }
    }

    return env;
}

/**
 * Merge the layered variables into `process.env`.
 * Call at startup before configuration is resolved.
 */
export function applyLayeredEnvironmentLoading(sources: EnvironmentSources = {}): void {
    Object.assign(process.env, loadEnvironmentVariables(sources));
}
