import { STATUS_CODES } from 'http';
import { v4 as uuidv4 } from 'uuid';

import {
    CacheRule,
    Clock,
    ForwardingConfig,
    HeaderList,
    InboundRequest,
    OutboundResponse,
    ProxyRequest,
    UpstreamServer
} from '../types/models';
import { getHeader, setHeader, stripHeaders } from '../utils/headers';
import { createLogger } from '../utils/logger';
import { buildCacheKey, CacheEntry, CacheLock, CacheStore } from './cache';
import { ConnectionManager, Timeouts, UpstreamRequest, UpstreamResponse } from './ConnectionManager';
import {
    ClientAbortError,
    errorMessage,
    NoHealthyUpstreamError,
    ProxyError,
    RateLimitedError,
    UpstreamBadResponseError,
    UpstreamConnectError,
    UpstreamError,
    UpstreamExhaustedError,
    UpstreamTimeoutError
} from './errors';
import { Route } from './Route';
import { CacheStatus, Tracker } from './Tracker';

const logger = createLogger('ProxyEngine');

const NON_IDEMPOTENT_METHODS = new Set(['POST', 'PATCH']);
const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export interface ProxyEngineOptions {
    cache: CacheStore;
    connections: ConnectionManager;
    tracker: Tracker;
    /** Upper bound on stale-while-revalidate refreshes running at once. */
    maxBackgroundRefreshes?: number;
    now?: Clock;
}

interface ForwardResult {
    response: UpstreamResponse;
    upstream: string;
}

interface RateLimitHeaders {
    limit: number;
    remaining: number;
}

/**
 * Runs one client request through rate limiting, the response cache and the
 * retrying forwarder, and turns the outcome into a response.
 */
export class ProxyEngine {
    private readonly cache: CacheStore;
    private readonly connections: ConnectionManager;
    private readonly tracker: Tracker;
    private readonly maxBackgroundRefreshes: number;
    private readonly now: Clock;

    private readonly lock = new CacheLock<ForwardResult>();
    private readonly refreshes = new Set<Promise<void>>();

    constructor(options: ProxyEngineOptions) {
        this.cache = options.cache;
        this.connections = options.connections;
        this.tracker = options.tracker;
        this.maxBackgroundRefreshes = options.maxBackgroundRefreshes ?? 16;
        this.now = options.now ?? Date.now;
    }

    /**
     * Resolves with the response to write, or undefined when the client went
     * away first (`signal` aborted). Never rejects for upstream problems;
     * those become 429/502/503 responses.
     */
    async handle(route: Route, request: InboundRequest, signal?: AbortSignal): Promise<OutboundResponse | undefined> {
        const proxyReq = this.createProxyRequest(route, request);
        this.tracker.trackRequestStart(route.vHost);

        let status = 500;
        try {
            const response = await this.process(route, proxyReq, signal);
            status = response.status;
            return response;
        } catch (err) {
            if (err instanceof ClientAbortError) {
                status = 499;
                this.tracker.trackAbort(route.vHost);
                logger.info({ reqId: proxyReq.id, target: proxyReq.meta.target }, 'Client aborted request');
                return undefined;
            }

            const response = this.errorResponse(route, proxyReq, err);
            status = response.status;
            return response;
        } finally {
            this.tracker.trackRequestEnd(proxyReq, status < 500);
        }
    }

    /** Number of background cache refreshes currently running. */
    get pendingRefreshes(): number {
        return this.refreshes.size;
    }

    /** Waits for running background refreshes to settle. */
    async drain(): Promise<void> {
        await Promise.all(Array.from(this.refreshes));
    }

    /** Cancels background refreshes and in-flight shared fetches. */
    async close(): Promise<void> {
        this.lock.abortAll();
        await this.drain();
    }

    private createProxyRequest(route: Route, request: InboundRequest): ProxyRequest {
        const startTime = this.now();
        return {
            id: getHeader(request.headers, 'x-request-id') ?? uuidv4(),
            request,
            startTime,
            deadline: startTime + route.config.proxy.requestTimeoutMs,
            attempts: 0,
            excluded: new Set(),
            meta: {
                vHost: route.vHost,
                clientIp: request.clientAddress
            }
        };
    }

    private async process(route: Route, proxyReq: ProxyRequest, signal?: AbortSignal): Promise<OutboundResponse> {
        const { request } = proxyReq;

        // 1. Admission
        const limiter = route.rateLimiter;
        let rateLimit: RateLimitHeaders | undefined;
        if (limiter) {
            const decision = limiter.allow(limiter.keyFor(request));
            if (!decision.allowed) {
                throw new RateLimitedError(decision.retryAfterSeconds);
            }
            rateLimit = { limit: decision.limit, remaining: decision.remaining };
        }

        // 2. Cache
        const rule = route.cachePolicy.match(request.path);
        let response: OutboundResponse;
        if (rule && !route.cachePolicy.bypassReason(rule, request)) {
            response = await this.serveCacheable(route, proxyReq, rule, signal);
        } else {
            const result = await this.forward(route, proxyReq, signal);
            response = this.toClientResponse(route, result.response, result.upstream, rule ? 'BYPASS' : undefined);
        }

        if (rateLimit) {
            response.headers.push(['X-RateLimit-Limit', String(rateLimit.limit)]);
            response.headers.push(['X-RateLimit-Remaining', String(rateLimit.remaining)]);
        }
        return response;
    }

    private async serveCacheable(route: Route, proxyReq: ProxyRequest, rule: CacheRule, signal?: AbortSignal): Promise<OutboundResponse> {
        const key = buildCacheKey(proxyReq.request, rule.varyHeaders);
        const lookup = this.cache.get(key);

        if (lookup && lookup.state === 'fresh') {
            return this.fromCache(route, lookup.entry, 'HIT');
        }

        if (lookup) {
            const refreshing = this.lock.isLocked(key);
            if (!refreshing) {
                this.refreshInBackground(route, proxyReq, rule, key);
            }
            return this.fromCache(route, lookup.entry, refreshing ? 'UPDATING' : 'STALE');
        }

        // Concurrent misses for one key share a single upstream fetch
        const { value } = await this.lock.run(key, lockSignal => this.fetchAndStore(route, proxyReq, rule, key, lockSignal), signal);
        return this.toClientResponse(route, value.response, value.upstream, 'MISS');
    }

    private refreshInBackground(route: Route, proxyReq: ProxyRequest, rule: CacheRule, key: string): void {
        if (this.refreshes.size >= this.maxBackgroundRefreshes) {
            logger.debug({ key, running: this.refreshes.size }, 'Background refresh limit reached, serving stale only');
            return;
        }

        const now = this.now();
        const refreshReq: ProxyRequest = {
            ...proxyReq,
            startTime: now,
            deadline: now + route.config.proxy.requestTimeoutMs,
            attempts: 0,
            excluded: new Set(),
            meta: { ...proxyReq.meta, target: undefined }
        };

        this.cache.setUpdating(key, true);
        const task: Promise<void> = this.lock.run(key, lockSignal => this.fetchAndStore(route, refreshReq, rule, key, lockSignal))
            .then((result) => {
                logger.debug({ key, upstream: result.value.upstream }, 'Background refresh finished');
            }, (err: unknown) => {
                logger.warn({ key, err: errorMessage(err) }, 'Background refresh failed');
            })
            .finally(() => {
                this.cache.setUpdating(key, false);
                this.refreshes.delete(task);
            });
        this.refreshes.add(task);
    }

    private async fetchAndStore(route: Route, proxyReq: ProxyRequest, rule: CacheRule, key: string, signal: AbortSignal): Promise<ForwardResult> {
        const result = await this.forward(route, proxyReq, signal);
        const headers = stripHeaders(result.response.headers, route.config.proxy.hideHeaders);
        const ttl = route.cachePolicy.ttlFor(rule, { status: result.response.status, headers, body: result.response.body });

        if (ttl > 0) {
            try {
                this.cache.put(key, {
                    status: result.response.status,
                    headers,
                    body: result.response.body,
                    ttlSeconds: ttl,
                    staleSeconds: rule.staleWhileRevalidateSeconds
                });
            } catch (err) {
                // A failed store only costs a future hit
                logger.warn({ key, err: errorMessage(err) }, 'Could not store response in cache');
            }
        }
        return result;
    }

    /**
     * Tries upstreams until one answers acceptably, at most `maxAttempts`
     * times and never the same server twice for one request.
     */
    private async forward(route: Route, proxyReq: ProxyRequest, signal?: AbortSignal): Promise<ForwardResult> {
        const config = route.config.proxy;
        const upstreamReq = this.buildUpstreamRequest(proxyReq);
        const method = proxyReq.request.method.toUpperCase();
        const retryAnything = config.retryNonIdempotent || !NON_IDEMPOTENT_METHODS.has(method);

        let lastError: Error | undefined;

        while (proxyReq.attempts < config.maxAttempts) {
            const remaining = proxyReq.deadline - this.now();
            if (remaining <= 0) {
                logger.warn({ reqId: proxyReq.id, attempts: proxyReq.attempts }, 'Request deadline exceeded');
                break;
            }

            const server = route.getNextUpstream(proxyReq.meta.clientIp, proxyReq.excluded);
            if (!server) {
                if (proxyReq.attempts === 0) {
                    throw new NoHealthyUpstreamError(route.vHost);
                }
                break;
            }

            proxyReq.attempts++;
            proxyReq.meta.target = server.address;

            try {
                const response = await this.attempt(server, upstreamReq, this.timeoutsFor(config, remaining), remaining, signal);
                const bad = route.health.isBadStatus(response.status);

                if (bad) route.health.reportFailure(server);
                else route.health.reportSuccess(server);

                if (config.retryStatusCodes.includes(response.status)) {
                    if (!retryAnything) {
                        return { response, upstream: server.address };
                    }
                    lastError = new UpstreamBadResponseError(server.address, response.status);
                    proxyReq.excluded.add(server.address);
                    logger.warn({ reqId: proxyReq.id, upstream: server.address, status: response.status, attempt: proxyReq.attempts }, 'Retrying after bad upstream status');
                    continue;
                }

                return { response, upstream: server.address };
            } catch (err) {
                if (!(err instanceof UpstreamError)) {
                    throw err;
                }

                route.health.reportFailure(server);
                proxyReq.excluded.add(server.address);
                lastError = err;
                logger.warn({ reqId: proxyReq.id, upstream: server.address, code: err.code, attempt: proxyReq.attempts }, err.message);

                // The request may already have been acted upon
                if (!retryAnything && !isConnectFailure(err)) break;
            }
        }

        logger.error({ reqId: proxyReq.id, vHost: route.vHost, attempts: proxyReq.attempts, err: lastError?.message }, 'Upstream attempts exhausted');
        throw new UpstreamExhaustedError(proxyReq.attempts);
    }

    /**
     * One upstream attempt bounded by the remaining request deadline. A client
     * abort surfaces as ClientAbortError, the deadline as UpstreamTimeoutError.
     */
    private async attempt(
        server: UpstreamServer,
        request: UpstreamRequest,
        timeouts: Timeouts,
        remainingMs: number,
        signal?: AbortSignal
    ): Promise<UpstreamResponse> {
        const controller = new AbortController();
        let deadlineHit = false;

        const onClientAbort = () => controller.abort();
        if (signal?.aborted) controller.abort();
        signal?.addEventListener('abort', onClientAbort, { once: true });

        const deadline = setTimeout(() => {
            deadlineHit = true;
            controller.abort();
        }, remainingMs);

        try {
            return await this.connections.send(server, request, timeouts, controller.signal);
        } catch (err) {
            if (err instanceof ClientAbortError && deadlineHit && !signal?.aborted) {
                throw new UpstreamTimeoutError(server.address, 'read');
            }
            throw err;
        } finally {
            clearTimeout(deadline);
            signal?.removeEventListener('abort', onClientAbort);
        }
    }

    private timeoutsFor(config: ForwardingConfig, remainingMs: number): Timeouts {
        return {
            connectTimeoutMs: Math.min(config.connectTimeoutMs, remainingMs),
            sendTimeoutMs: Math.min(config.sendTimeoutMs, remainingMs),
            readTimeoutMs: Math.min(config.readTimeoutMs, remainingMs)
        };
    }

    private buildUpstreamRequest(proxyReq: ProxyRequest): UpstreamRequest {
        const { request } = proxyReq;
        let headers: HeaderList = stripHeaders(request.headers, ['content-length']);

        const forwardedFor = getHeader(headers, 'x-forwarded-for');
        headers = setHeader(headers, 'X-Forwarded-For', forwardedFor ? `${forwardedFor}, ${request.clientAddress}` : request.clientAddress);
        headers = setHeader(headers, 'X-Forwarded-Proto', request.scheme);
        headers = setHeader(headers, 'X-Forwarded-Host', request.host);
        headers = setHeader(headers, 'X-Request-Id', proxyReq.id);

        if (request.body.length > 0 || BODY_METHODS.has(request.method.toUpperCase())) {
            headers.push(['Content-Length', String(request.body.length)]);
        }

        return {
            method: request.method,
            path: request.query ? `${request.path}?${request.query}` : request.path,
            headers,
            body: request.body
        };
    }

    private toClientResponse(route: Route, response: UpstreamResponse, upstream: string, cacheStatus?: CacheStatus): OutboundResponse {
        const headers = stripHeaders(response.headers, route.config.proxy.hideHeaders);

        if (route.config.proxy.diagnosticHeaders) {
            headers.push(['X-Upstream-Addr', upstream]);
            if (cacheStatus) headers.push(['X-Cache-Status', cacheStatus]);
        }
        if (cacheStatus) this.tracker.trackCache(route.vHost, cacheStatus);

        return { status: response.status, headers, body: response.body };
    }

    private fromCache(route: Route, entry: CacheEntry, cacheStatus: CacheStatus): OutboundResponse {
        const headers: HeaderList = entry.headers.map(([k, v]) => [k, v]);
        if (route.config.proxy.diagnosticHeaders) {
            headers.push(['X-Cache-Status', cacheStatus]);
        }
        this.tracker.trackCache(route.vHost, cacheStatus);
        return { status: entry.status, headers, body: entry.body };
    }

    /**
     * Client-facing error. The body names the failure class only; upstream
     * addresses and internal messages stay in the logs.
     */
    private errorResponse(route: Route, proxyReq: ProxyRequest, err: unknown): OutboundResponse {
        const error = err instanceof ProxyError ? err : undefined;
        if (!error) {
            logger.error({ reqId: proxyReq.id, err: errorMessage(err) }, 'Unexpected error while proxying');
        }

        const status = error?.statusCode ?? 500;
        const code = error?.code ?? 'INTERNAL_ERROR';
        this.tracker.trackError(route.vHost, code);

        const headers: HeaderList = [['Content-Type', 'application/json']];
        if (err instanceof RateLimitedError) {
            headers.push(['Retry-After', String(err.retryAfterSeconds)]);
            headers.push(['X-RateLimit-Remaining', '0']);
            if (route.config.rateLimit) {
                headers.push(['X-RateLimit-Limit', String(route.config.rateLimit.capacity)]);
            }
        }

        const body = Buffer.from(JSON.stringify({ error: STATUS_CODES[status] ?? 'Error', code }));
        return { status, headers, body };
    }
}

function isConnectFailure(err: UpstreamError): boolean {
    return err instanceof UpstreamConnectError || (err instanceof UpstreamTimeoutError && err.phase === 'connect');
}
