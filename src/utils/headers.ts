import { HeaderList } from '../types/models';

// Connection-scoped headers, never forwarded in either direction
export const HOP_BY_HOP_HEADERS: readonly string[] = [
    'connection',
    'keep-alive',
    'proxy-connection',
    'proxy-authenticate',
    'proxy-authorization',
    'te',
    'trailer',
    'transfer-encoding',
    'upgrade'
];

export function getHeader(headers: HeaderList, name: string): string | undefined {
    const lower = name.toLowerCase();
    const values = headers.filter(([k]) => k.toLowerCase() === lower).map(([, v]) => v);
    return values.length > 0 ? values.join(', ') : undefined;
}

export function hasHeader(headers: HeaderList, name: string): boolean {
    const lower = name.toLowerCase();
    return headers.some(([k]) => k.toLowerCase() === lower);
}

/**
 * Returns a copy without the named headers, without hop-by-hop headers, and
 * without any header listed in a `Connection` header. A trailing `*` in a
 * name matches by prefix ("x-internal-*").
 */
export function stripHeaders(headers: HeaderList, names: readonly string[] = []): HeaderList {
    const exact = new Set<string>(HOP_BY_HOP_HEADERS);
    const prefixes: string[] = [];

    for (const name of names) {
        const lower = name.toLowerCase();
        if (lower.endsWith('*')) prefixes.push(lower.slice(0, -1));
        else exact.add(lower);
    }

    const connection = getHeader(headers, 'connection');
    if (connection) {
        for (const token of connection.split(',')) {
            const t = token.trim().toLowerCase();
            if (t) exact.add(t);
        }
    }

    return headers.filter(([k]) => {
        const lower = k.toLowerCase();
        return !exact.has(lower) && !prefixes.some(p => lower.startsWith(p));
    });
}

export function setHeader(headers: HeaderList, name: string, value: string): HeaderList {
    const lower = name.toLowerCase();
    return [...headers.filter(([k]) => k.toLowerCase() !== lower), [name, value]];
}

export function parseCookies(headers: HeaderList): Map<string, string> {
    const cookies = new Map<string, string>();
    const raw = getHeader(headers, 'cookie');
    if (!raw) return cookies;

    for (const part of raw.split(/[;,]/)) {
        const idx = part.indexOf('=');
        if (idx <= 0) continue;
        cookies.set(part.slice(0, idx).trim(), part.slice(idx + 1).trim());
    }
    return cookies;
}

/** Directive names of a Cache-Control (or Pragma) value, lower-cased. */
export function cacheDirectives(value: string | undefined): Set<string> {
    const directives = new Set<string>();
    if (!value) return directives;
    for (const part of value.split(',')) {
        const name = part.split('=')[0].trim().toLowerCase();
        if (name) directives.add(name);
    }
    return directives;
}
