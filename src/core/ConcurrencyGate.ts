import { availableParallelism } from 'node:os';

/** Upper bound on simultaneous connections, and therefore on gate permits. */
export const MAX_CONNECTIONS = 100;

/**
 * Counting semaphore. Bounds in-flight fetches, and open sockets in the pool.
 */
export class ConcurrencyGate {
    private active = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Gate capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Size the gate from the host's core count: max(1, cores * factor),
     * never above MAX_CONNECTIONS.
     */
    static forHost(factor: number, override?: number): ConcurrencyGate {
        const wanted = override ?? Math.max(1, Math.floor(availableParallelism() * factor));
        return new ConcurrencyGate(Math.min(MAX_CONNECTIONS, wanted));
    }

    get inFlight(): number {
        return this.active;
    }

    get pending(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<void> {
        if (this.active < this.capacity) {
            this.active++;
            return;
        }
        // The permit is handed over by release(), so active is not touched here.
        await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    release(): void {
        if (this.active === 0) {
            throw new Error('ConcurrencyGate.release() called without a held permit');
        }
        const next = this.waiters.shift();
        if (next) {
            next();
            return;
        }
        this.active--;
    }

    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}
