import { Agent, fetch as undiciFetch, interceptors, type Dispatcher } from 'undici';
import { SessionClosedError } from '../errors.js';
import { Logger } from '../logger.js';
import type { CacheStore, Config, HttpFetch, HttpResponseLike } from '../types.js';
import { ConcurrencyGate, MAX_CONNECTIONS } from './ConcurrencyGate.js';
import { MemoryCacheStore } from './MemoryCacheStore.js';
import { budgetedConnector } from './SocketBudget.js';
import { SqliteCacheStore } from './SqliteCacheStore.js';

export const DNS_TTL_MS = 5 * 60_000;

const log = new Logger('session');

export interface SessionOptions {
    /** HTTP implementation. Defaults to undici's fetch. */
    fetch?: HttpFetch;
    /** Use this store instead of building one from config. */
    cacheStore?: CacheStore;
}

const defaultFetch: HttpFetch = (url, init) => undiciFetch(url, init);

export async function createCacheStore(config: Config): Promise<CacheStore> {
    switch (config.cacheBackend) {
        case 'persistent':
            return SqliteCacheStore.open({ file: config.cacheDbPath, maxEntries: config.cacheMaxEntries });
        case 'memory':
            return new MemoryCacheStore(config.cacheMaxEntries);
    }
}

/**
 * Owns everything a fetch shares with other fetches: the connection pool,
 * the DNS cache, default headers, the response cache and the concurrency gate.
 * One per process, created by the entry point and passed to whoever needs it.
 */
export class Session {
    readonly headers: Readonly<Record<string, string>>;
    private closed = false;
    private closing: Promise<void> | null = null;

    private constructor(
        readonly config: Config,
        readonly cache: CacheStore,
        readonly gate: ConcurrencyGate,
        private readonly sockets: ConcurrencyGate,
        private readonly agent: Agent,
        private readonly dispatcher: Dispatcher,
        private readonly httpFetch: HttpFetch
    ) {
        this.headers = Object.freeze({
            'User-Agent': config.userAgent,
            'Accept': 'text/html,application/xhtml+xml',
        });
    }

    static async open(config: Config, options: SessionOptions = {}): Promise<Session> {
        const cache = options.cacheStore ?? (await createCacheStore(config));
        const gate = ConcurrencyGate.forHost(config.concurrencyFactor, config.maxConcurrency);
        // Open sockets, busy or idle, across every origin.
        const sockets = new ConcurrencyGate(MAX_CONNECTIONS);
        const agent = new Agent({
            connections: MAX_CONNECTIONS,
            connect: budgetedConnector(sockets),
            keepAliveTimeout: config.keepAliveMs,
            keepAliveMaxTimeout: config.keepAliveMs,
        });
        const dispatcher = agent.compose(interceptors.dns({ maxTTL: DNS_TTL_MS }));

        log.info('Session opened', {
            cacheBackend: options.cacheStore ? 'custom' : config.cacheBackend,
            gateCapacity: gate.capacity,
        });
        return new Session(config, cache, gate, sockets, agent, dispatcher, options.fetch ?? defaultFetch);
    }

    /** Sockets currently open in the pool. */
    get openSockets(): number {
        return this.sockets.inFlight;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    assertOpen(): void {
        if (this.closed) throw new SessionClosedError();
    }

    /**
     * Issue one GET through the pool. `signal` bounds this attempt only.
     */
    async request(url: string, signal: AbortSignal): Promise<HttpResponseLike> {
        this.assertOpen();
        return this.httpFetch(url, {
            method: 'GET',
            headers: { ...this.headers },
            signal,
            dispatcher: this.dispatcher,
        });
    }

    /**
     * Release the pool and the cache store. Later calls return the first call's promise.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closed = true;
            this.closing = this.release();
        }
        return this.closing;
    }

    private async release(): Promise<void> {
        const results = await Promise.allSettled([this.agent.close(), this.cache.close()]);
        const failures = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
        if (failures.length > 0) {
            log.error('Session close failed', { error: failures[0] });
            throw failures[0];
        }
        log.info('Session closed');
    }
}
