// Enums for strategies
export enum BalancingStrategy {
    ROUND_ROBIN = 'ROUND_ROBIN',
    WEIGHTED_ROUND_ROBIN = 'WEIGHTED_ROUND_ROBIN',
    LEAST_CONNECTIONS = 'LEAST_CONNECTIONS',
    IP_HASH = 'IP_HASH',
    CONSISTENT_HASH = 'CONSISTENT_HASH'
}

export type UpstreamRole = 'primary' | 'backup';
export type UpstreamState = 'healthy' | 'unhealthy';

/** Milliseconds since epoch. Injected so tests can move time. */
export type Clock = () => number;

// A backend server (Target)
export interface UpstreamServer {
    address: string; // host:port
    host: string;
    port: number;
    weight: number;
    role: UpstreamRole;

    // Runtime state
    state: UpstreamState;
    currentFailureCount: number;
    lastFailureTimestamp: number;
    activeConnectionCount: number;
}

export interface UpstreamServerConfig {
    address: string;
    weight?: number;
    role?: UpstreamRole;
}

export interface PoolConfig {
    servers: UpstreamServerConfig[];
    strategy: BalancingStrategy;
    maxFails: number;
    failTimeoutSeconds: number;
    probeIntervalSeconds: number;
    probePath: string;
}

export interface CacheRule {
    pathPattern: string; // glob, e.g. "/api/*"
    ttlByStatus: Record<number, number>; // seconds
    bypass: {
        headers: string[];
        cookies: string[];
    };
    varyHeaders: string[];
    maxEntrySizeBytes: number;
    staleWhileRevalidateSeconds: number;
    honorClientNoCache: boolean;
}

export type RateLimitKey =
    | { type: 'client-ip' }
    | { type: 'header'; name: string };

export interface RateLimitZoneConfig {
    key: RateLimitKey;
    capacity: number;
    refillRatePerSecond: number;
    maxKeys: number;
}

export interface ForwardingConfig {
    maxAttempts: number;
    connectTimeoutMs: number;
    sendTimeoutMs: number;
    readTimeoutMs: number;
    requestTimeoutMs: number;
    retryStatusCodes: number[];
    badStatusCodes: number[];
    retryNonIdempotent: boolean;
    hideHeaders: string[];
    diagnosticHeaders: boolean;
}

// A Virtual Host Route
export interface RouteConfig {
    id: string;
    vHost: string; // e.g., "api.example.com", or "*" for the default route
    pool: PoolConfig;
    cache: CacheRule[];
    rateLimit?: RateLimitZoneConfig;
    proxy: ForwardingConfig;
}

export interface Routes {
    routes: RouteConfig[];
}

/** Ordered, multi-valued header list as it arrived on the wire. */
export type HeaderList = Array<[string, string]>;

export interface InboundRequest {
    method: string;
    scheme: 'http' | 'https';
    host: string;
    path: string;
    query: string; // without the leading "?"
    headers: HeaderList;
    body: Buffer;
    clientAddress: string;
    receivedAt: number;
}

export interface OutboundResponse {
    status: number;
    headers: HeaderList;
    body: Buffer;
}

export interface ProxyRequest {
    id: string;
    request: InboundRequest;
    startTime: number;
    deadline: number;
    attempts: number;
    excluded: Set<string>;
    meta: {
        vHost: string;
        clientIp: string;
        target?: string;
    };
}
