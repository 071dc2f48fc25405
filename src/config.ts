import type { ZodError } from 'zod';
import { ConfigSchema, EnvSchema, type ConfigInput } from './schemas.js';
import { ConfigError } from './errors.js';
import type { Config } from './types.js';

function issuesOf(error: ZodError, prefix = ''): string[] {
    return error.issues.map((issue) => `${prefix}${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a programmatic configuration and fill in defaults.
 * The returned object is frozen and meant to be shared by reference.
 */
export function resolveConfig(input: ConfigInput = {}): Config {
    const parsed = ConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError(issuesOf(parsed.error));
    }
    return Object.freeze({ ...parsed.data, urls: Object.freeze([...parsed.data.urls]) });
}

/**
 * Read the configuration from environment variables (durations in seconds).
 * Unset and empty variables fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const present = Object.fromEntries(
        Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== '')
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError(issuesOf(parsed.error, 'env '));
    }
    const e = parsed.data;

    return resolveConfig({
        timeoutMs: e.TIMEOUT,
        cacheExpireMs: e.CACHE_EXPIRE,
        maxRetries: e.MAX_RETRIES,
        pattern: e.PATTERN,
        cacheBackend: e.CACHE_BACKEND,
        cacheDbPath: e.CACHE_DB_PATH,
        cacheMaxEntries: e.CACHE_MAX_ENTRIES,
        backoffBaseMs: e.BACKOFF_BASE_MS,
        backoffJitterMs: e.BACKOFF_JITTER_MS,
        backoffMaxMs: e.BACKOFF_MAX_MS,
        concurrencyFactor: e.CONCURRENCY_FACTOR,
        maxConcurrency: e.MAX_CONCURRENCY,
        keepAliveMs: e.KEEP_ALIVE_MS,
        userAgent: e.USER_AGENT,
        urls: e.URLS,
    });
}
