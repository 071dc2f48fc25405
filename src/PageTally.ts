import { loadConfig } from './config.js';
import { isPageTallyError, messageOf } from './errors.js';
import { Fetcher, type FetcherOptions } from './core/Fetcher.js';
import { PatternMatcher } from './core/PatternMatcher.js';
import { Session, type SessionOptions } from './core/Session.js';
import { Logger } from './logger.js';
import type { Config, TallyFailure, TallyReport, TallyResult } from './types.js';

export interface PageTallyOptions extends SessionOptions, FetcherOptions {}

/**
 * Entry point: fetches a page and counts the configured pattern in it.
 * Owns the Session for its lifetime; call shutdown() once when done.
 *
 * @example
 * const tally = await PageTally.open();
 * const count = await tally.analyze('https://example.com');
 * await tally.shutdown();
 */
export class PageTally {
    private readonly log = new Logger('pipeline');

    private constructor(
        readonly config: Config,
        private readonly session: Session,
        private readonly fetcher: Fetcher,
        private readonly matcher: PatternMatcher
    ) {}

    /**
     * Open a pipeline. Without a config, settings are read from the environment.
     */
    static async open(config: Config = loadConfig(), options: PageTallyOptions = {}): Promise<PageTally> {
        // Compile first so a bad pattern fails before any resource is held.
        const matcher = new PatternMatcher(config.pattern);
        const session = await Session.open(config, { fetch: options.fetch, cacheStore: options.cacheStore });
        const fetcher = new Fetcher({ wait: options.wait, random: options.random });
        return new PageTally(config, session, fetcher, matcher);
    }

    async analyze(url: string): Promise<number> {
        const body = await this.fetcher.fetch(this.session, url);
        return this.matcher.count(body);
    }

    /**
     * Analyze several URLs concurrently. A failing URL is reported in
     * `errors` and does not stop the others.
     */
    async analyzeAll(urls: readonly string[] = this.config.urls): Promise<TallyReport> {
        const started = Date.now();
        const outcomes = await Promise.all(
            urls.map(async (url, urlId): Promise<TallyResult | TallyFailure> => {
                try {
                    return { urlId, url, count: await this.analyze(url) };
                } catch (error) {
                    this.log.error('Analysis failed', { url, error });
                    return {
                        urlId,
                        url,
                        kind: isPageTallyError(error) ? error.kind : 'Unknown',
                        message: messageOf(error),
                    };
                }
            })
        );

        const results = outcomes.filter((o): o is TallyResult => 'count' in o);
        const errors = outcomes.filter((o): o is TallyFailure => 'kind' in o);
        const totalTimeMs = Date.now() - started;
        this.log.info('Batch finished', { urlsProcessed: urls.length, failed: errors.length, durationMs: totalTimeMs });

        return { results, errors, urlsProcessed: urls.length, totalTimeMs };
    }

    async shutdown(): Promise<void> {
        await this.session.close();
    }
}
