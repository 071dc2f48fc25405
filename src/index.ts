export { PageTally, type PageTallyOptions } from './PageTally.js';
export { loadConfig, resolveConfig } from './config.js';
export { ConfigSchema, EnvSchema, DEFAULT_PATTERN, DEFAULT_USER_AGENT, type ConfigInput } from './schemas.js';
export * from './errors.js';
export { configureLogger, type LogLevel, type LoggerConfig } from './logger.js';
export { PatternMatcher } from './core/PatternMatcher.js';
export { ConcurrencyGate } from './core/ConcurrencyGate.js';
export { MemoryCacheStore } from './core/MemoryCacheStore.js';
export { SqliteCacheStore, type SqliteCacheStoreOptions } from './core/SqliteCacheStore.js';
export type {
    CacheBackend,
    CacheStore,
    Config,
    HttpFetch,
    HttpRequestInit,
    HttpResponseLike,
    TallyFailure,
    TallyReport,
    TallyResult,
} from './types.js';
