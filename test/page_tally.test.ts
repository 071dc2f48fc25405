import test from 'node:test';
import assert from 'node:assert/strict';
import { PageTally } from '../src/PageTally.js';
import { resolveConfig } from '../src/config.js';
import { MemoryCacheStore } from '../src/core/MemoryCacheStore.js';
import { InvalidPatternError, SessionClosedError } from '../src/errors.js';
import { configureLogger } from '../src/logger.js';
import type { HttpFetch } from '../src/types.js';
import { delay, fakeHttp, html, tmpPath } from './helpers.js';

configureLogger({ level: 'silent' });

const ANCHOR = String.raw`<a\s[^>]*href`;
const TWO_LINKS = '<a href="x">1</a><a href="y">2</a>';

class CountingStore extends MemoryCacheStore {
    closes = 0;

    override async close(): Promise<void> {
        this.closes++;
        await super.close();
    }
}

test('analyze returns the number of matches in the fetched page', async () => {
    const http = fakeHttp(() => html(TWO_LINKS));
    const tally = await PageTally.open(resolveConfig({ pattern: ANCHOR }), { fetch: http.fetch });

    try {
        assert.equal(await tally.analyze('https://example.com/'), 2);
        assert.equal(await tally.analyze('https://example.com/'), 2);
        assert.equal(http.calls.length, 1);
    } finally {
        await tally.shutdown();
    }
});

test('concurrent analyses never exceed the gate capacity', async () => {
    let inFlight = 0;
    let peak = 0;
    const fetch: HttpFetch = async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
        return html(TWO_LINKS);
    };
    const tally = await PageTally.open(resolveConfig({ pattern: ANCHOR, maxConcurrency: 2 }), { fetch });

    try {
        const urls = Array.from({ length: 8 }, (_, i) => `https://example.com/page-${i}`);
        const counts = await Promise.all(urls.map((url) => tally.analyze(url)));

        assert.deepEqual(counts, [2, 2, 2, 2, 2, 2, 2, 2]);
        assert.equal(peak, 2);
    } finally {
        await tally.shutdown();
    }
});

test('analyzeAll reports results and failures per URL', async () => {
    const http = fakeHttp((url) => (url.endsWith('/missing') ? html('Not Found', 404) : html(TWO_LINKS)));
    const tally = await PageTally.open(resolveConfig({ pattern: ANCHOR }), { fetch: http.fetch });

    try {
        const report = await tally.analyzeAll([
            'https://a.example/',
            'https://b.example/missing',
            'not a url',
            'https://c.example/',
        ]);

        assert.deepEqual(report.results, [
            { urlId: 0, url: 'https://a.example/', count: 2 },
            { urlId: 3, url: 'https://c.example/', count: 2 },
        ]);
        assert.deepEqual(report.errors, [
            { urlId: 1, url: 'https://b.example/missing', kind: 'HTTPClientError', message: 'HTTP 404' },
            { urlId: 2, url: 'not a url', kind: 'InvalidURL', message: 'Invalid URL: not a url' },
        ]);
        assert.equal(report.urlsProcessed, 4);
        assert.ok(report.totalTimeMs >= 0);
    } finally {
        await tally.shutdown();
    }
});

test('analyzeAll defaults to the configured URL list', async () => {
    const http = fakeHttp(() => html(TWO_LINKS));
    const config = resolveConfig({ pattern: ANCHOR, urls: ['https://a.example/', 'https://b.example/'] });
    const tally = await PageTally.open(config, { fetch: http.fetch });

    try {
        const report = await tally.analyzeAll();
        assert.equal(report.urlsProcessed, 2);
        assert.deepEqual(
            report.results.map((r) => r.url),
            ['https://a.example/', 'https://b.example/']
        );
    } finally {
        await tally.shutdown();
    }
});

test('shutdown twice is safe and releases the store once', async () => {
    const store = new CountingStore();
    const http = fakeHttp(() => html(TWO_LINKS));
    const tally = await PageTally.open(resolveConfig({ pattern: ANCHOR }), { fetch: http.fetch, cacheStore: store });

    await tally.shutdown();
    await tally.shutdown();

    assert.equal(store.closes, 1);
    await assert.rejects(tally.analyze('https://example.com/'), SessionClosedError);
    assert.equal(http.calls.length, 0);
});

test('an invalid pattern fails before the session opens', async () => {
    const store = new CountingStore();
    await assert.rejects(
        PageTally.open(resolveConfig({ pattern: '[unterminated' }), { cacheStore: store }),
        InvalidPatternError
    );
    assert.equal(store.closes, 0);
});

test('the persistent backend serves a later process from disk', async () => {
    const config = resolveConfig({
        pattern: ANCHOR,
        cacheBackend: 'persistent',
        cacheDbPath: tmpPath('tally.sqlite'),
    });

    const online = fakeHttp(() => html(TWO_LINKS));
    const first = await PageTally.open(config, { fetch: online.fetch });
    assert.equal(await first.analyze('https://example.com/'), 2);
    await first.shutdown();

    const offline = fakeHttp(() => {
        throw new Error('network should not be touched');
    });
    const second = await PageTally.open(config, { fetch: offline.fetch });
    try {
        assert.equal(await second.analyze('https://example.com/'), 2);
        assert.equal(offline.calls.length, 0);
    } finally {
        await second.shutdown();
    }
});
