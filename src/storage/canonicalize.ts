/**
 * URL canonicalization: the deduplication key for records, documents and the
 * crawl frontier.
 *
 * - Lowercase scheme and host (WHATWG URL parsing also drops default ports)
 * - Remove fragment
 * - Sort query parameters by key
 * - Remove trailing slash from non-root paths
 *
 * Never throws: a URL that does not parse falls back to its trimmed,
 * lowercased text without trailing slashes.
 */
export function canonicalize(url: string): string {
    if (!url) return '';

    const trimmed = url.trim();
    if (!trimmed) return '';

    let parsed: URL;
    try {
        parsed = new URL(trimmed);
    } catch {
        return fallback(trimmed);
    }

    parsed.hash = '';

    if (parsed.search) {
        const params = new URLSearchParams(parsed.search);
        params.sort();
        const query = params.toString();
        parsed.search = query ? `?${query}` : '';
    }

    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
        parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
    }

    return parsed.toString();
}

/**
 * Host (including port) of a URL, lowercased; null when it does not parse.
 */
export function hostOf(url: string): string | null {
    try {
        return new URL(url.trim()).host.toLowerCase();
    } catch {
        return null;
    }
}

/**
 * True when both URLs parse and share a host.
 */
export function sameHost(a: string, b: string): boolean {
    const hostA = hostOf(a);
    return hostA !== null && hostA === hostOf(b);
}

/**
 * True for absolute http(s) URLs.
 */
export function isHttpUrl(url: string): boolean {
    try {
        const { protocol } = new URL(url);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

function fallback(url: string): string {
    return url.toLowerCase().replace(/\/+$/, '');
}
