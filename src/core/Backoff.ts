export interface BackoffOptions {
    baseMs: number;
    jitterMs: number;
    maxMs: number;
}

/**
 * Exponential backoff with additive jitter:
 * delay = min(maxMs, baseMs * 2^attempt) + random() * jitterMs
 *
 * `attempt` is 0 for the wait after the first failure.
 */
export function backoffDelay(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
    const exponential = Math.min(options.maxMs, options.baseMs * 2 ** attempt);
    return Math.floor(exponential + random() * options.jitterMs);
}

export async function sleep(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
}
