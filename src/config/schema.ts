import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { BalancingStrategy, RouteConfig, Routes } from '../types/models';

const StatusCode = z.coerce.number().int().min(100).max(599);

export const UpstreamServerSchema = z.object({
    address: z.string().regex(/^.+:\d{1,5}$/, 'expected host:port'),
    weight: z.number().int().positive().optional().default(1),
    role: z.enum(['primary', 'backup']).optional().default('primary')
});

export const PoolSchema = z.object({
    servers: z.array(UpstreamServerSchema).min(1),
    strategy: z.nativeEnum(BalancingStrategy).optional().default(BalancingStrategy.ROUND_ROBIN),
    maxFails: z.number().int().positive().optional().default(1),
    failTimeoutSeconds: z.number().nonnegative().optional().default(10),
    probeIntervalSeconds: z.number().nonnegative().optional().default(0),
    probePath: z.string().startsWith('/').optional().default('/')
});

export const CacheRuleSchema = z.object({
    pathPattern: z.string().min(1),
    ttlByStatus: z.record(z.string().regex(/^\d{3}$/), z.number().nonnegative())
        .optional()
        .default({ '200': 60, '301': 60, '302': 60, '404': 10 }),
    bypass: z.object({
        headers: z.array(z.string()).optional().default([]),
        cookies: z.array(z.string()).optional().default([])
    }).optional().default({}),
    varyHeaders: z.array(z.string()).optional().default([]),
    maxEntrySizeBytes: z.number().int().positive().optional().default(1024 * 1024),
    staleWhileRevalidateSeconds: z.number().nonnegative().optional().default(0),
    honorClientNoCache: z.boolean().optional().default(false)
});

export const RateLimitZoneSchema = z.object({
    key: z.discriminatedUnion('type', [
        z.object({ type: z.literal('client-ip') }),
        z.object({ type: z.literal('header'), name: z.string().min(1) })
    ]).optional().default({ type: 'client-ip' }),
    capacity: z.number().positive(),
    refillRatePerSecond: z.number().positive(),
    maxKeys: z.number().int().positive().optional().default(10000)
});

export const ForwardingSchema = z.object({
    maxAttempts: z.number().int().positive().optional().default(3),
    connectTimeoutMs: z.number().int().positive().optional().default(5000),
    sendTimeoutMs: z.number().int().positive().optional().default(10000),
    readTimeoutMs: z.number().int().positive().optional().default(10000),
    requestTimeoutMs: z.number().int().positive().optional().default(30000),
    retryStatusCodes: z.array(StatusCode).optional().default([502, 503, 504]),
    badStatusCodes: z.array(StatusCode).optional().default([500, 502, 503, 504]),
    retryNonIdempotent: z.boolean().optional().default(false),
    hideHeaders: z.array(z.string()).optional().default([]),
    diagnosticHeaders: z.boolean().optional().default(true)
});

export const RouteConfigSchema = z.object({
    id: z.string().optional().default(() => uuidv4()),
    vHost: z.string().min(1),
    pool: PoolSchema,
    cache: z.array(CacheRuleSchema).optional().default([]),
    rateLimit: RateLimitZoneSchema.optional(),
    proxy: ForwardingSchema.optional().default({})
});

export const RoutesFileSchema = z.object({
    routes: z.array(RouteConfigSchema)
});

export function parseRouteConfig(input: unknown): RouteConfig {
    return RouteConfigSchema.parse(input);
}

export function parseRoutes(input: unknown): Routes {
    return RoutesFileSchema.parse(input);
}

export const ProcessConfigSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    API_PORT: z.coerce.number().int().min(0).max(65535).default(8081),
    ROUTES_FILE: z.string().default('./routes.json'),
    CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10000),
    CACHE_MAX_BYTES: z.coerce.number().int().positive().default(64 * 1024 * 1024),
    CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30000),
    MAX_BODY_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    MAX_BACKGROUND_REFRESHES: z.coerce.number().int().positive().default(16)
});
