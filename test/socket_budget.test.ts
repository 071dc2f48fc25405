import test from 'node:test';
import assert from 'node:assert/strict';
import { createServer, type Server } from 'node:http';
import { Socket } from 'node:net';
import type { buildConnector } from 'undici';
import { resolveConfig } from '../src/config.js';
import { ConcurrencyGate, MAX_CONNECTIONS } from '../src/core/ConcurrencyGate.js';
import { budgetedConnector } from '../src/core/SocketBudget.js';
import { configureLogger } from '../src/logger.js';
import { PageTally } from '../src/PageTally.js';
import { delay } from './helpers.js';

configureLogger({ level: 'silent' });

const target: buildConnector.Options = { hostname: '127.0.0.1', protocol: 'http:', port: '80' };

test('holds a permit per socket until the socket closes', async () => {
    const budget = new ConcurrencyGate(1);
    const sockets: Socket[] = [];
    const connector = budgetedConnector(budget, (_options, callback) => {
        const socket = new Socket();
        sockets.push(socket);
        callback(null, socket);
    });

    const connected: Socket[] = [];
    const record: buildConnector.Callback = (...[error, socket]) => {
        assert.equal(error, null);
        if (socket !== null && socket instanceof Socket) connected.push(socket);
    };

    connector(target, record);
    connector(target, record);
    await delay(10);
    assert.equal(connected.length, 1);
    assert.equal(budget.pending, 1);

    sockets[0].destroy();
    await delay(10);
    assert.equal(connected.length, 2);
    assert.equal(budget.inFlight, 1);

    sockets[1].destroy();
    await delay(10);
    assert.equal(budget.inFlight, 0);
});

test('returns the permit when connecting fails', async () => {
    const budget = new ConcurrencyGate(1);
    const connector = budgetedConnector(budget, (_options, callback) => {
        callback(new Error('connect ECONNREFUSED'), null);
    });

    const errors: string[] = [];
    await new Promise<void>((resolve) => {
        connector(target, (...[error]) => {
            errors.push(error?.message ?? 'none');
            resolve();
        });
    });

    assert.deepEqual(errors, ['connect ECONNREFUSED']);
    assert.equal(budget.inFlight, 0);
});

interface Origin {
    server: Server;
    base: string;
}

async function startOrigins(count: number, onSocket: (delta: number) => void): Promise<Origin[]> {
    const origins: Origin[] = [];
    for (let i = 0; i < count; i++) {
        const server = createServer((_req, res) => {
            setTimeout(() => {
                res.writeHead(200, { 'content-type': 'text/html' });
                res.end('<a href="https://example.com/">x</a>');
            }, 5);
        });
        server.on('connection', (socket) => {
            onSocket(1);
            socket.once('close', () => onSocket(-1));
        });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server has no port');
        origins.push({ server, base: `http://127.0.0.1:${address.port}` });
    }
    return origins;
}

async function stopOrigins(origins: Origin[]): Promise<void> {
    await Promise.all(
        origins.map(({ server }) => new Promise<void>((resolve) => {
            server.closeAllConnections();
            server.close(() => resolve());
        }))
    );
}

test('keeps simultaneous sockets across origins within the connection limit', async () => {
    let open = 0;
    let peak = 0;
    const origins = await startOrigins(3, (delta) => {
        open += delta;
        peak = Math.max(peak, open);
    });

    const tally = await PageTally.open(resolveConfig({
        maxConcurrency: MAX_CONNECTIONS,
        keepAliveMs: 1_000,
        maxRetries: 0,
    }));
    try {
        const urls = Array.from({ length: 450 }, (_, i) => `${origins[i % 3].base}/page/${i}`);
        const report = await tally.analyzeAll(urls);

        assert.equal(report.errors.length, 0);
        assert.equal(report.results.length, 450);
        assert.ok(report.results.every((r) => r.count === 1));
        assert.ok(peak > 0);
        assert.ok(peak <= MAX_CONNECTIONS, `peak of ${peak} sockets`);
    } finally {
        await tally.shutdown();
        await stopOrigins(origins);
    }
});
