import { errorMessage } from '../errors/runtime-error.js';
import { ErrorScope } from '../errors/types.js';
import { AcquisitionError } from './errors.js';

export interface HttpRequestOptions {
    userAgent: string;
    /** Absolute timeout for the whole request, body included */
    timeoutMs: number;
    token?: string | undefined;
    /** Cancellation signal owned by the session */
    signal?: AbortSignal | undefined;
    accept?: string;
}

type TransferScope = ErrorScope.LISTING | ErrorScope.FETCH;

export function buildHeaders(options: HttpRequestOptions): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': options.userAgent };
    if (options.accept) {
        headers['Accept'] = options.accept;
    }
    if (options.token) {
        headers['Authorization'] = `Bearer ${options.token}`;
    }
    return headers;
}

/**
 * Combine the session's cancel signal with an absolute timeout
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function isTimeoutError(error: unknown): boolean {
    return (
        typeof error === 'object' &&
        error !== null &&
        'name' in error &&
        error.name === 'TimeoutError'
    );
}

/**
 * Map a rejected fetch/read into the acquisition taxonomy.
 * Cancellation is not decided here: callers check their own signal first.
 */
export function toTransferError(
    url: string,
    error: unknown,
    timeoutMs: number,
    scope: TransferScope
): Error {
    if (isTimeoutError(error)) {
        return AcquisitionError.timeout(url, timeoutMs, scope);
    }
    const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return AcquisitionError.network(url, `${errorMessage(error)}${cause}`, scope);
}

/**
 * GET a URL and require a success status.
 *
 * @throws VaultRuntimeError (auth required, HTTP status, timeout or network)
 */
export async function getOk(
    url: string,
    options: HttpRequestOptions,
    scope: TransferScope,
    signal: AbortSignal = requestSignal(options.timeoutMs, options.signal)
): Promise<Response> {
    let response: Response;
    try {
        response = await fetch(url, { headers: buildHeaders(options), signal });
    } catch (error) {
        throw toTransferError(url, error, options.timeoutMs, scope);
    }

    if (response.status === 401 || response.status === 403) {
        throw AcquisitionError.authRequired(url, response.status, scope);
    }
    if (!response.ok) {
        throw AcquisitionError.httpStatus(url, response.status, response.statusText, scope);
    }
    return response;
}

/**
 * GET a JSON document from a listing endpoint
 */
export async function getJson(url: string, options: HttpRequestOptions): Promise<unknown> {
    const signal = requestSignal(options.timeoutMs, options.signal);
    const response = await getOk(
        url,
        { ...options, accept: 'application/json' },
        ErrorScope.LISTING,
        signal
    );
    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        throw toTransferError(url, error, options.timeoutMs, ErrorScope.LISTING);
    }
    try {
        return JSON.parse(text);
    } catch (error) {
        throw AcquisitionError.malformedResponse(url, errorMessage(error));
    }
}
