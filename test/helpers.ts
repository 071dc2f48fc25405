import os from 'node:os';
import path from 'node:path';
import type { HttpFetch, HttpRequestInit, HttpResponseLike } from '../src/types.js';

export interface RecordedCall {
    url: string;
    init: HttpRequestInit;
}

/**
 * In-process stand-in for the network. `respond` sees the 1-based call number.
 */
export function fakeHttp(respond: (url: string, call: number, init: HttpRequestInit) => HttpResponseLike | Promise<HttpResponseLike>) {
    const calls: RecordedCall[] = [];
    const fetch: HttpFetch = async (url, init) => {
        calls.push({ url, init });
        return respond(url, calls.length, init);
    };
    return { fetch, calls };
}

export function html(body: string, status = 200): HttpResponseLike {
    return new Response(body, { status, headers: { 'content-type': 'text/html' } });
}

export function tmpPath(name: string): string {
    return path.join(os.tmpdir(), `page-tally-${Date.now()}-${Math.random().toString(16).slice(2)}`, name);
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
