import { promises as fs } from 'fs';
import type { AuthConfig } from '../config/schemas.js';
import { expandHome } from '../config/paths.js';
import { errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { isNotFound } from '../utils/fs.js';

export interface ResolveTokenOptions {
    env?: NodeJS.ProcessEnv;
    logger?: Logger;
}

/**
 * Find a bearer token: the configured environment variable first, then the
 * first token file that exists and is non-empty.
 */
export async function resolveAuthToken(
    auth: AuthConfig,
    options: ResolveTokenOptions = {}
): Promise<string | undefined> {
    const env = options.env ?? process.env;
    const fromEnv = env[auth.tokenEnvVar]?.trim();
    if (fromEnv) {
        return fromEnv;
    }

    for (const candidate of auth.tokenFiles) {
        const tokenPath = expandHome(candidate);
        try {
            const token = (await fs.readFile(tokenPath, 'utf-8')).trim();
            if (token) {
                return token;
            }
        } catch (error) {
            if (!isNotFound(error)) {
                options.logger?.debug(`Skipping token file ${tokenPath}: ${errorMessage(error)}`);
            }
        }
    }
    return undefined;
}
