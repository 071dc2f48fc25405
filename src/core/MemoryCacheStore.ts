import { SessionClosedError } from '../errors.js';
import type { CacheEntry, CacheStore } from '../types.js';

/**
 * In-process LRU (Least Recently Used) response cache.
 * Visible only to the owning process; bounded to `maxEntries`.
 */
export class MemoryCacheStore implements CacheStore {
    private readonly entries = new Map<string, CacheEntry>();
    private closed = false;

    constructor(private readonly maxEntries = 1000) {}

    get size(): number {
        return this.entries.size;
    }

    async get(key: string): Promise<string | null> {
        this.assertOpen();
        const entry = this.entries.get(key);
        if (!entry) return null;

        if (Date.now() - entry.storedAt >= entry.ttlMs) {
            this.entries.delete(key);
            return null;
        }

        // Refresh LRU order; storedAt stays put so expiry is measured from the write.
        this.entries.delete(key);
        this.entries.set(key, entry);

        return entry.body;
    }

    async put(key: string, body: string, ttlMs: number): Promise<void> {
        this.assertOpen();
        this.entries.delete(key);
        if (this.entries.size >= this.maxEntries) {
            // Evict oldest (first key in iteration)
            const oldestKey = this.entries.keys().next().value;
            if (oldestKey !== undefined) {
                this.entries.delete(oldestKey);
            }
        }
        this.entries.set(key, { key, body, storedAt: Date.now(), ttlMs });
    }

    async close(): Promise<void> {
        this.closed = true;
        this.entries.clear();
    }

    private assertOpen(): void {
        if (this.closed) throw new SessionClosedError('cache store');
    }
}
