import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AutomaticSource, ModelEntry } from '../catalog/types.js';
import type { AuthConfig, TimeoutConfig } from '../config/schemas.js';
import { expandHome } from '../config/paths.js';
import { VaultRuntimeError, errorMessage } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { pathExists } from '../utils/fs.js';
import { resolveAuthToken } from './auth.js';
import type { ConverterRegistry } from './conversion/registry.js';
import { AcquisitionErrorCode } from './error-codes.js';
import { AcquisitionError, hasCode, isCancellation } from './errors.js';
import { fetchToFile } from './fetcher.js';
import { createLister } from './listing/index.js';
import type { RemoteFileLister } from './listing/types.js';
import type { DownloadSession } from './session.js';

export interface WorkerDependencies {
    userAgent: string;
    chunkSize: number;
    timeouts: TimeoutConfig;
    auth: AuthConfig;
    converters: ConverterRegistry;
    logger: Logger;
    /** Replaces the built-in lister for a source kind; used by tests */
    listerFor?: (kind: AutomaticSource['kind']) => RemoteFileLister;
}

/**
 * Resolve `relativePath` under `root`, refusing anything that escapes it
 */
export function resolveInside(root: string, relativePath: string): string {
    const resolved = path.resolve(root, relativePath);
    const relative = path.relative(root, resolved);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
        throw AcquisitionError.unsafePath(relativePath);
    }
    return resolved;
}

/**
 * Drive one session to a terminal outcome. Never rejects: every failure ends
 * up in the session's error message.
 *
 * Candidates are tried in order (primary, then backups). Each attempt lists
 * the files afresh and downloads them sequentially; nothing carries over from
 * a failed attempt.
 */
export async function runDownload(
    session: DownloadSession,
    entry: ModelEntry,
    source: AutomaticSource,
    deps: WorkerDependencies
): Promise<void> {
    const logger = deps.logger;
    const destinationDir = expandHome(entry.storage.localPath);

    try {
        const existedBefore = await pathExists(destinationDir);
        const token = await resolveAuthToken(deps.auth, { logger });
        const lister = deps.listerFor
            ? deps.listerFor(source.kind)
            : createLister(source.kind, {
                  userAgent: deps.userAgent,
                  timeoutMs: deps.timeouts.listingMs,
                  logger,
              });

        const candidates = [source.url, ...source.backupUrls];
        let lastError = 'No download URLs configured';

        for (const [index, candidate] of candidates.entries()) {
            if (session.cancelRequested) {
                await finishCancelled(session, destinationDir, source, logger);
                return;
            }
            if (index > 0) {
                logger.info(`Trying backup URL ${index} of ${candidates.length - 1} for ${entry.id}`, {
                    url: candidate,
                });
            }

            try {
                await attemptCandidate(session, entry, source, candidate, {
                    deps,
                    lister,
                    token,
                    destinationDir,
                    existedBefore,
                });
                session.markCompleted();
                logger.info(`Downloaded ${entry.id}`, {
                    url: candidate,
                    bytes: session.bytesTransferred,
                });
                return;
            } catch (error) {
                if (isCancellation(error) || session.cancelRequested) {
                    await finishCancelled(session, destinationDir, source, logger);
                    return;
                }
                lastError = errorMessage(error);
                logger.warn(`Download failed from ${candidate}: ${lastError}`, { modelId: entry.id });

                if (
                    hasCode(error, AcquisitionErrorCode.CONVERSION_FAILED) ||
                    hasCode(error, AcquisitionErrorCode.UNKNOWN_CONVERTER)
                ) {
                    break;
                }
            }
        }

        session.markFailed(lastError);
    } catch (error) {
        if (error instanceof VaultRuntimeError || !(error instanceof Error)) {
            logger.error(`Unexpected failure while downloading ${entry.id}: ${errorMessage(error)}`);
        } else {
            logger.trackException(error, { modelId: entry.id });
        }
        session.markFailed(errorMessage(error));
    }
}

interface AttemptContext {
    deps: WorkerDependencies;
    lister: RemoteFileLister;
    token: string | undefined;
    destinationDir: string;
    existedBefore: boolean;
}

async function attemptCandidate(
    session: DownloadSession,
    entry: ModelEntry,
    source: AutomaticSource,
    candidate: string,
    context: AttemptContext
): Promise<void> {
    const { deps, lister, token, destinationDir, existedBefore } = context;
    const conversion = source.conversion;

    const files = await lister.list({
        url: candidate,
        revision: source.revision,
        token,
        signal: session.signal,
    });
    const bytesTotal = files.reduce((sum, file) => sum + file.size, 0);
    session.setListing(bytesTotal, files.length);
    deps.logger.debug(`Fetching ${files.length} files for ${entry.id}`, { bytesTotal, candidate });

    // Validate the converter before spending bandwidth
    const converter = conversion ? deps.converters.get(conversion.converter) : undefined;
    const targetDir = conversion
        ? await fs.mkdtemp(path.join(os.tmpdir(), `modelvault-${safeName(entry.id)}-`))
        : destinationDir;
    const written: string[] = [];

    try {
        for (const [index, file] of files.entries()) {
            if (session.cancelRequested) {
                throw AcquisitionError.cancelled(entry.id);
            }
            session.setCurrentFile(index, file.path);
            const destPath = resolveInside(targetDir, file.path);
            written.push(destPath);

            const base = session.bytesTransferred;
            const bytes = await fetchToFile(file.downloadUrl, destPath, {
                signal: session.signal,
                timeoutMs: deps.timeouts.transferMs,
                chunkSize: deps.chunkSize,
                userAgent: deps.userAgent,
                token,
                modelId: entry.id,
                onProgress: (soFar) => session.setTransferred(base + soFar),
            });
            session.setTransferred(base + bytes);
        }

        if (conversion && converter) {
            if (session.cancelRequested) {
                throw AcquisitionError.cancelled(entry.id);
            }
            session.setCurrentFile(files.length, `converting (${converter.name})`);
            try {
                await fs.mkdir(destinationDir, { recursive: true });
                await converter.convert({
                    modelId: entry.id,
                    stagingDir: targetDir,
                    destinationDir,
                    options: conversion.options,
                    logger: deps.logger,
                });
            } catch (error) {
                await discardAttempt(destinationDir, [], existedBefore);
                throw error instanceof VaultRuntimeError
                    ? error
                    : AcquisitionError.conversionFailed(entry.id, converter.name, errorMessage(error));
            }
            session.setTransferred(session.bytesTotal);
        }
    } catch (error) {
        if (!conversion && !isCancellation(error) && !session.cancelRequested) {
            await discardAttempt(destinationDir, written, existedBefore);
        }
        throw error;
    } finally {
        if (conversion) {
            await fs.rm(targetDir, { recursive: true, force: true });
        }
    }
}

/**
 * Remove what a failed attempt left behind. A directory created by this
 * session goes entirely; a pre-existing one only loses the files written now.
 */
async function discardAttempt(
    destinationDir: string,
    written: string[],
    existedBefore: boolean
): Promise<void> {
    if (!existedBefore) {
        await fs.rm(destinationDir, { recursive: true, force: true });
        return;
    }
    for (const file of written) {
        await fs.rm(file, { force: true });
    }
}

async function finishCancelled(
    session: DownloadSession,
    destinationDir: string,
    source: AutomaticSource,
    logger: Logger
): Promise<void> {
    // Staged conversions never touch the destination before converting
    if (!source.conversion) {
        try {
            await fs.rm(destinationDir, { recursive: true, force: true });
        } catch (error) {
            logger.warn(`Could not remove ${destinationDir} after cancel: ${errorMessage(error)}`);
        }
    }
    session.markCancelled();
    logger.info(`Download of ${session.modelId} cancelled`);
}

function safeName(id: string): string {
    return id.replace(/[^a-zA-Z0-9._-]/g, '_');
}
