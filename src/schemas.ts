import { z } from 'zod';
import { MAX_CONNECTIONS } from './core/ConcurrencyGate.js';
import type { CacheBackend } from './types.js';

export const DEFAULT_PATTERN = String.raw`<a\s+[^>]*href\s*=\s*["'](?:http|https)://[^"']*["'][^>]*>(.*?)</a>`;

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; PageTally/1.0)';

const CacheBackendSchema = z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['memory', 'persistent', 'sqlite']).transform((v): CacheBackend => (v === 'sqlite' ? 'persistent' : v))
);

/**
 * Programmatic configuration. Durations are milliseconds.
 */
export const ConfigSchema = z.object({
    timeoutMs: z.number().int().min(1).default(10_000),
    cacheExpireMs: z.number().int().min(1).default(3_600_000),
    maxRetries: z.number().int().min(0).default(3),
    pattern: z.string().min(1).default(DEFAULT_PATTERN),
    cacheBackend: CacheBackendSchema.default('memory'),
    cacheDbPath: z.string().min(1).default('.cache/page-tally/http-cache.sqlite'),
    cacheMaxEntries: z.number().int().min(1).default(1000),
    backoffBaseMs: z.number().int().min(0).default(1000),
    backoffJitterMs: z.number().int().min(0).default(100),
    backoffMaxMs: z.number().int().min(0).default(30_000),
    concurrencyFactor: z.number().min(0).default(2),
    maxConcurrency: z.number().int().min(1).max(MAX_CONNECTIONS).optional(),
    keepAliveMs: z.number().int().min(1).default(4_000),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    urls: z.array(z.string()).default([]),
});

const seconds = z.coerce.number().positive().transform((s) => Math.round(s * 1000));
const integer = z.coerce.number().int();

/**
 * Environment surface. Durations are seconds, lists are comma separated.
 */
export const EnvSchema = z.object({
    TIMEOUT: seconds.optional(),
    CACHE_EXPIRE: seconds.optional(),
    MAX_RETRIES: integer.optional(),
    PATTERN: z.string().optional(),
    CACHE_BACKEND: z.string().optional(),
    CACHE_DB_PATH: z.string().optional(),
    CACHE_MAX_ENTRIES: integer.optional(),
    BACKOFF_BASE_MS: integer.optional(),
    BACKOFF_JITTER_MS: integer.optional(),
    BACKOFF_MAX_MS: integer.optional(),
    CONCURRENCY_FACTOR: z.coerce.number().optional(),
    MAX_CONCURRENCY: integer.optional(),
    KEEP_ALIVE_MS: integer.optional(),
    USER_AGENT: z.string().optional(),
    URLS: z
        .string()
        .transform((raw) => raw.split(',').map((u) => u.trim()).filter((u) => u.length > 0))
        .optional(),
});

export type ConfigInput = z.input<typeof ConfigSchema>;
export type EnvInput = z.infer<typeof EnvSchema>;
