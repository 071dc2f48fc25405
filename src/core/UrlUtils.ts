export function safeHttpUrl(input: string): URL | null {
    try {
        const u = new URL(input);
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
        if (!u.hostname) return null;
        return u;
    } catch {
        return null;
    }
}

/**
 * Cache key for a URL: the fragment never reaches the server and query
 * order does not change the resource. URL itself lowercases the host and
 * drops default ports.
 */
export function cacheKeyFor(url: URL): string {
    const u = new URL(url.href);
    u.hash = '';

    // Stable ordering.
    u.searchParams.sort();

    return u.href;
}
