import {
    ConnectionFailureError,
    FetchExhaustedError,
    HttpClientError,
    HttpServerError,
    InvalidUrlError,
    SessionClosedError,
    TimeoutError,
    type RetryableFetchError,
} from '../errors.js';
import { Logger } from '../logger.js';
import { backoffDelay, sleep } from './Backoff.js';
import type { Session } from './Session.js';
import { cacheKeyFor, safeHttpUrl } from './UrlUtils.js';

export interface FetcherOptions {
    /** Suspends between attempts. */
    wait?: (ms: number) => Promise<void>;
    random?: () => number;
}

type AttemptOutcome =
    | { type: 'ok'; body: string }
    | { type: 'client-error'; error: HttpClientError }
    | { type: 'retryable'; error: RetryableFetchError };

type RetryState =
    | { state: 'attempting'; attempt: number }
    | { state: 'backoff'; attempt: number; lastError: RetryableFetchError }
    | { state: 'succeeded'; body: string; attempts: number }
    | { state: 'failed'; error: HttpClientError | SessionClosedError }
    | { state: 'exhausted'; lastError: RetryableFetchError; attempts: number };

function errorCode(error: unknown): string | undefined {
    let current: unknown = error;
    while (current instanceof Error) {
        if ('code' in current && typeof current.code === 'string') return current.code;
        current = current.cause;
    }
    return undefined;
}

/**
 * One logical fetch: validate, consult the cache, then hold a gate permit
 * while the request is attempted up to maxRetries + 1 times.
 */
export class Fetcher {
    private readonly log = new Logger('fetcher');
    private readonly wait: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(options: FetcherOptions = {}) {
        this.wait = options.wait ?? sleep;
        this.random = options.random ?? Math.random;
    }

    async fetch(session: Session, url: string, maxRetries = session.config.maxRetries): Promise<string> {
        session.assertOpen();
        const parsed = safeHttpUrl(url);
        if (!parsed) throw new InvalidUrlError(url);

        const key = cacheKeyFor(parsed);
        const cached = await session.cache.get(key);
        if (cached !== null) {
            this.log.debug('Cache hit', { url: parsed.href });
            return cached;
        }

        return session.gate.run(async () => {
            const body = await this.retryLoop(session, parsed.href, maxRetries);
            await session.cache.put(key, body, session.config.cacheExpireMs);
            return body;
        });
    }

    private async retryLoop(session: Session, url: string, maxRetries: number): Promise<string> {
        const { backoffBaseMs, backoffJitterMs, backoffMaxMs } = session.config;
        let current: RetryState = { state: 'attempting', attempt: 0 };

        while (true) {
            switch (current.state) {
                case 'attempting': {
                    if (session.isClosed) {
                        current = { state: 'failed', error: new SessionClosedError() };
                        break;
                    }
                    const outcome = await this.attempt(session, url);
                    const attempts: number = current.attempt + 1;
                    if (outcome.type === 'ok') {
                        current = { state: 'succeeded', body: outcome.body, attempts };
                    } else if (outcome.type === 'client-error') {
                        current = { state: 'failed', error: outcome.error };
                    } else if (current.attempt < maxRetries) {
                        current = { state: 'backoff', attempt: current.attempt, lastError: outcome.error };
                    } else {
                        current = { state: 'exhausted', lastError: outcome.error, attempts };
                    }
                    break;
                }
                case 'backoff': {
                    const delay = backoffDelay(
                        current.attempt,
                        { baseMs: backoffBaseMs, jitterMs: backoffJitterMs, maxMs: backoffMaxMs },
                        this.random
                    );
                    this.log.debug('Retrying after failure', {
                        url,
                        attempt: current.attempt + 1,
                        delayMs: delay,
                        reason: current.lastError.message,
                    });
                    await this.wait(delay);
                    current = { state: 'attempting', attempt: current.attempt + 1 };
                    break;
                }
                case 'succeeded':
                    this.log.debug('Fetched', { url, attempts: current.attempts });
                    return current.body;
                case 'failed':
                    throw current.error;
                case 'exhausted':
                    this.log.warn('Retry budget exhausted', {
                        url,
                        attempts: current.attempts,
                        reason: current.lastError.message,
                    });
                    throw new FetchExhaustedError(url, current.lastError, current.attempts);
            }
        }
    }

    private async attempt(session: Session, url: string): Promise<AttemptOutcome> {
        const { timeoutMs } = session.config;
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            const response = await session.request(url, controller.signal);
            // Always drain the body so the connection goes back to the pool.
            const body = await response.text();

            if (response.status >= 400 && response.status < 500) {
                return { type: 'client-error', error: new HttpClientError(url, response.status) };
            }
            if (response.status < 200 || response.status >= 300) {
                return { type: 'retryable', error: new HttpServerError(url, response.status) };
            }

            return { type: 'ok', body };
        } catch (error) {
            if (controller.signal.aborted) {
                return { type: 'retryable', error: new TimeoutError(url, timeoutMs) };
            }
            if (error instanceof SessionClosedError) throw error;
            return { type: 'retryable', error: new ConnectionFailureError(url, errorCode(error), error) };
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
