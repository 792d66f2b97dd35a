import { InboundRequest } from '../../types/models';
import { getHeader } from '../../utils/headers';

const DEFAULT_PORTS: Record<string, string> = { http: '80', https: '443' };

export function normalizeHost(host: string, scheme: string): string {
    const lower = host.toLowerCase();
    const idx = lower.lastIndexOf(':');
    // Leave bare IPv6 literals alone
    if (idx > 0 && !lower.endsWith(']') && lower.slice(idx + 1) === DEFAULT_PORTS[scheme]) {
        return lower.slice(0, idx);
    }
    return lower;
}

export function normalizeQuery(query: string): string {
    if (!query) return '';
    const params = Array.from(new URLSearchParams(query).entries());
    params.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
    return new URLSearchParams(params).toString();
}

function compare(a: string, b: string): number {
    if (a < b) return -1;
    return a > b ? 1 : 0;
}

/**
 * Builds the cache key for a request:
 *
 *   METHOD scheme://host/path[?sorted-query][|header=value...]
 *
 * The host is lower-cased with a default port removed, query parameters are
 * sorted by name then value, and each vary header (lower-cased, sorted by
 * name) is appended with its value, or an empty value when absent.
 */
export function buildCacheKey(request: InboundRequest, varyHeaders: readonly string[] = []): string {
    const host = normalizeHost(request.host, request.scheme);
    const query = normalizeQuery(request.query);

    let key = `${request.method.toUpperCase()} ${request.scheme}://${host}${request.path}`;
    if (query) key += `?${query}`;

    const vary = varyHeaders.map(h => h.toLowerCase()).sort();
    for (const name of vary) {
        key += `|${name}=${getHeader(request.headers, name) ?? ''}`;
    }
    return key;
}
