import { CacheRule, InboundRequest, OutboundResponse } from '../../types/models';
import { cacheDirectives, getHeader, hasHeader, parseCookies } from '../../utils/headers';

const CACHEABLE_METHODS = new Set(['GET', 'HEAD']);

export type BypassReason = 'method' | 'header' | 'cookie' | 'client-no-cache';

/** Anchored glob where `*` matches any run of characters, including "/". */
export function globToRegExp(glob: string): RegExp {
    const source = glob
        .split('*')
        .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${source}$`);
}

export class CachePolicy {
    private readonly matchers: Array<{ rule: CacheRule; pattern: RegExp }>;

    constructor(rules: readonly CacheRule[]) {
        this.matchers = rules.map(rule => ({ rule, pattern: globToRegExp(rule.pathPattern) }));
    }

    /** First rule whose path pattern matches; rules are checked in configuration order. */
    match(path: string): CacheRule | undefined {
        return this.matchers.find(m => m.pattern.test(path))?.rule;
    }

    bypassReason(rule: CacheRule, request: InboundRequest): BypassReason | undefined {
        if (!CACHEABLE_METHODS.has(request.method.toUpperCase())) return 'method';

        if (rule.bypass.headers.some(h => hasHeader(request.headers, h))) return 'header';

        if (rule.bypass.cookies.length > 0) {
            const cookies = parseCookies(request.headers);
            if (rule.bypass.cookies.some(c => cookies.has(c))) return 'cookie';
        }

        if (rule.honorClientNoCache) {
            const cc = cacheDirectives(getHeader(request.headers, 'cache-control'));
            const pragma = cacheDirectives(getHeader(request.headers, 'pragma'));
            if (cc.has('no-cache') || cc.has('no-store') || pragma.has('no-cache')) return 'client-no-cache';
        }

        return undefined;
    }

    /**
     * TTL in seconds for storing this response, or 0 when it must not be
     * stored: no TTL configured for the status, `Set-Cookie` present,
     * `Cache-Control: no-store/private/no-cache`, or too large.
     */
    ttlFor(rule: CacheRule, response: OutboundResponse): number {
        const ttl = rule.ttlByStatus[response.status] ?? 0;
        if (ttl <= 0) return 0;

        if (hasHeader(response.headers, 'set-cookie')) return 0;

        const cc = cacheDirectives(getHeader(response.headers, 'cache-control'));
        if (cc.has('no-store') || cc.has('private') || cc.has('no-cache')) return 0;

        if (response.body.length > rule.maxEntrySizeBytes) return 0;

        return ttl;
    }
}
