/**
 * In-process HTTP stand-ins for acquisition tests
 */

import { vi } from 'vitest';

export interface RecordedRequest {
    url: string;
    headers: Record<string, string>;
}

export type RouteHandler = (request: RecordedRequest, init: RequestInit | undefined) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export function bytesResponse(bytes: Uint8Array, status = 200): Response {
    return new Response(bytes, { status });
}

/**
 * Body delivered as the given chunks, one `read()` each
 */
export function chunkedResponse(chunks: Uint8Array[]): Response {
    let index = 0;
    const stream = new ReadableStream<Uint8Array>({
        pull(controller) {
            const next = chunks[index++];
            if (next) {
                controller.enqueue(next);
            } else {
                controller.close();
            }
        },
    });
    return new Response(stream, { status: 200 });
}

function headersOf(init: RequestInit | undefined): Record<string, string> {
    const result: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
        result[key] = value;
    });
    return result;
}

/**
 * Replace global fetch with a router keyed by exact URL.
 * Unknown URLs answer 404. Every request is recorded in order.
 */
export function stubFetch(routes: Record<string, RouteHandler>) {
    const requests: RecordedRequest[] = [];
    const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
        const request = { url, headers: headersOf(init) };
        requests.push(request);
        const handler = routes[url];
        if (!handler) {
            return new Response('not found', { status: 404, statusText: 'Not Found' });
        }
        return handler(request, init);
    });
    vi.stubGlobal('fetch', mock);
    return { mock, requests };
}
