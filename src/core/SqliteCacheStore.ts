import Database from 'better-sqlite3';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SessionClosedError } from '../errors.js';
import type { CacheStore } from '../types.js';

export interface SqliteCacheStoreOptions {
    file: string;
    maxEntries: number;
}

interface Row {
    body: string;
    stored_at: number;
    ttl_ms: number;
}

/**
 * Single-file persistent response cache.
 *
 * The database runs in WAL mode: one writer commits while readers, in this
 * process or another, keep reading the last committed snapshot. Expired rows
 * are swept when the store opens and deleted lazily when a read finds them.
 */
export class SqliteCacheStore implements CacheStore {
    private closed = false;
    private readonly selectStmt: Database.Statement<[string], Row>;
    private readonly upsertStmt: Database.Statement<[string, string, number, number]>;
    private readonly deleteStmt: Database.Statement<[string]>;
    private readonly countStmt: Database.Statement<[], { n: number }>;
    private readonly pruneStmt: Database.Statement<[number]>;

    private constructor(private readonly db: Database.Database, private readonly options: SqliteCacheStoreOptions) {
        db.pragma('journal_mode = WAL');
        db.pragma('busy_timeout = 5000');
        db.exec(`
            CREATE TABLE IF NOT EXISTS responses (
                key TEXT PRIMARY KEY,
                body TEXT NOT NULL,
                stored_at INTEGER NOT NULL,
                ttl_ms INTEGER NOT NULL
            );
            CREATE INDEX IF NOT EXISTS responses_stored_at ON responses (stored_at);
        `);

        this.selectStmt = db.prepare<[string], Row>('SELECT body, stored_at, ttl_ms FROM responses WHERE key = ?');
        this.upsertStmt = db.prepare<[string, string, number, number]>(
            `INSERT INTO responses (key, body, stored_at, ttl_ms) VALUES (?, ?, ?, ?)
             ON CONFLICT(key) DO UPDATE SET body = excluded.body, stored_at = excluded.stored_at, ttl_ms = excluded.ttl_ms`
        );
        this.deleteStmt = db.prepare<[string]>('DELETE FROM responses WHERE key = ?');
        this.countStmt = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM responses');
        this.pruneStmt = db.prepare<[number]>(
            'DELETE FROM responses WHERE key IN (SELECT key FROM responses ORDER BY stored_at ASC LIMIT ?)'
        );
    }

    static async open(options: SqliteCacheStoreOptions): Promise<SqliteCacheStore> {
        await fs.mkdir(path.dirname(path.resolve(options.file)), { recursive: true });
        const store = new SqliteCacheStore(new Database(options.file), options);
        store.sweep();
        return store;
    }

    get size(): number {
        this.assertOpen();
        return this.countStmt.get()?.n ?? 0;
    }

    async get(key: string): Promise<string | null> {
        this.assertOpen();
        const row = this.selectStmt.get(key);
        if (!row) return null;
        if (Date.now() - row.stored_at >= row.ttl_ms) {
            this.deleteStmt.run(key);
            return null;
        }
        return row.body;
    }

    async put(key: string, body: string, ttlMs: number): Promise<void> {
        this.assertOpen();
        this.upsertStmt.run(key, body, Date.now(), ttlMs);
        const overflow = this.size - this.options.maxEntries;
        if (overflow > 0) {
            this.pruneStmt.run(overflow);
        }
    }

    /**
     * Delete every expired row. Returns the number removed.
     */
    sweep(): number {
        this.assertOpen();
        return this.db.prepare<[number]>('DELETE FROM responses WHERE stored_at + ttl_ms <= ?').run(Date.now()).changes;
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.db.close();
    }

    private assertOpen(): void {
        if (this.closed) throw new SessionClosedError('cache store');
    }
}
