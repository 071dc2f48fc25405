export type ErrorKind =
    | 'InvalidURL'
    | 'HTTPClientError'
    | 'HTTPServerError'
    | 'Timeout'
    | 'ConnectionFailure'
    | 'FetchExhausted'
    | 'SessionClosed'
    | 'InvalidPattern'
    | 'Config';

/**
 * Base class for every failure the library surfaces.
 * `retryable` marks the kinds the fetch loop absorbs until its budget runs out.
 */
export abstract class PageTallyError extends Error {
    abstract readonly kind: ErrorKind;
    readonly retryable: boolean = false;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidUrlError extends PageTallyError {
    readonly kind = 'InvalidURL';

    constructor(readonly url: string) {
        super(`Invalid URL: ${url}`);
    }
}

export class HttpClientError extends PageTallyError {
    readonly kind = 'HTTPClientError';

    constructor(readonly url: string, readonly status: number) {
        super(`HTTP ${status}`);
    }
}

export class HttpServerError extends PageTallyError {
    readonly kind = 'HTTPServerError';
    override readonly retryable = true;

    constructor(readonly url: string, readonly status: number) {
        super(`HTTP ${status}`);
    }
}

export class TimeoutError extends PageTallyError {
    readonly kind = 'Timeout';
    override readonly retryable = true;

    constructor(readonly url: string, readonly timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
    }
}

export class ConnectionFailureError extends PageTallyError {
    readonly kind = 'ConnectionFailure';
    override readonly retryable = true;

    constructor(readonly url: string, readonly code: string | undefined, cause: unknown) {
        super(code ? `Connection failed (${code})` : `Connection failed: ${messageOf(cause)}`, { cause });
    }
}

export type RetryableFetchError = HttpServerError | TimeoutError | ConnectionFailureError;

export class FetchExhaustedError extends PageTallyError {
    readonly kind = 'FetchExhausted';

    constructor(readonly url: string, readonly lastError: RetryableFetchError, readonly attempts: number) {
        super(`Gave up on ${url} after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    }
}

export class SessionClosedError extends PageTallyError {
    readonly kind = 'SessionClosed';

    constructor(what = 'session') {
        super(`The ${what} is closed`);
    }
}

export class InvalidPatternError extends PageTallyError {
    readonly kind = 'InvalidPattern';

    constructor(readonly pattern: string, cause: unknown) {
        super(`Invalid pattern ${JSON.stringify(pattern)}: ${messageOf(cause)}`, { cause });
    }
}

export class ConfigError extends PageTallyError {
    readonly kind = 'Config';

    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
    }
}

export function isPageTallyError(value: unknown): value is PageTallyError {
    return value instanceof PageTallyError;
}

export function messageOf(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
