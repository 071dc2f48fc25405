import type { Dispatcher } from 'undici';

export type CacheBackend = 'memory' | 'persistent';

export interface Config {
    timeoutMs: number;
    cacheExpireMs: number;
    maxRetries: number;
    pattern: string;
    cacheBackend: CacheBackend;
    cacheDbPath: string; // only read when cacheBackend is 'persistent'
    cacheMaxEntries: number;
    backoffBaseMs: number;
    backoffJitterMs: number;
    backoffMaxMs: number;
    concurrencyFactor: number;
    maxConcurrency?: number; // overrides the core-count sizing of the gate, at most 100
    keepAliveMs: number; // idle lifetime of a pooled socket
    userAgent: string;
    urls: readonly string[];
}

/**
 * Key → body store with expiry. Implementations must never return an entry
 * whose age has reached the ttl it was stored with.
 */
export interface CacheStore {
    get(key: string): Promise<string | null>;
    put(key: string, body: string, ttlMs: number): Promise<void>;
    close(): Promise<void>;
}

export interface CacheEntry {
    key: string;
    body: string;
    storedAt: number;
    ttlMs: number;
}

export interface HttpRequestInit {
    method: 'GET';
    headers: Record<string, string>;
    signal: AbortSignal;
    dispatcher: Dispatcher;
}

export interface HttpResponseLike {
    status: number;
    text(): Promise<string>;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export interface TallyResult {
    urlId: number;
    url: string;
    count: number;
}

export interface TallyFailure {
    urlId: number;
    url: string;
    kind: string;
    message: string;
}

export interface TallyReport {
    results: TallyResult[];
    errors: TallyFailure[];
    urlsProcessed: number;
    totalTimeMs: number;
}
