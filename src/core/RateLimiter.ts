import { Clock, InboundRequest, RateLimitZoneConfig } from '../types/models';
import { getHeader } from '../utils/headers';

export interface RateLimitBucket {
    key: string;
    tokens: number;
    capacity: number;
    refillRatePerSecond: number;
    lastRefillTimestamp: number;
}

export interface RateLimitDecision {
    allowed: boolean;
    limit: number;
    remaining: number;
    /** Whole seconds until one token is available; 0 when allowed. */
    retryAfterSeconds: number;
}

/**
 * Token bucket per key. Buckets start full, refill continuously at
 * `refillRatePerSecond` up to `capacity`, and each request takes one token.
 * An idle key can therefore burst `capacity` requests at once.
 *
 * Calls never wait. Each call runs to completion on the event loop, so the
 * refill-then-take step needs no lock, and buckets for different keys share
 * nothing but the LRU index.
 */
export class RateLimiter {
    private buckets = new Map<string, RateLimitBucket>();
    private readonly now: Clock;

    private allowedTotal = 0;
    private deniedTotal = 0;

    constructor(private readonly zone: RateLimitZoneConfig, now?: Clock) {
        this.now = now ?? Date.now;
    }

    keyFor(request: InboundRequest): string {
        if (this.zone.key.type === 'header') {
            const value = getHeader(request.headers, this.zone.key.name);
            if (value) return `${this.zone.key.name.toLowerCase()}:${value}`;
        }
        return `ip:${request.clientAddress}`;
    }

    allow(key: string): RateLimitDecision {
        const now = this.now();
        const bucket = this.getBucket(key, now);

        const elapsedSeconds = Math.max(0, now - bucket.lastRefillTimestamp) / 1000;
        bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsedSeconds * bucket.refillRatePerSecond);
        bucket.lastRefillTimestamp = now;

        if (bucket.tokens >= 1) {
            bucket.tokens -= 1;
            this.allowedTotal++;
            return {
                allowed: true,
                limit: bucket.capacity,
                remaining: Math.floor(bucket.tokens),
                retryAfterSeconds: 0
            };
        }

        this.deniedTotal++;
        const missing = 1 - bucket.tokens;
        return {
            allowed: false,
            limit: bucket.capacity,
            remaining: 0,
            retryAfterSeconds: bucket.refillRatePerSecond > 0 ? Math.ceil(missing / bucket.refillRatePerSecond) : 0
        };
    }

    stats(): { keys: number; allowed: number; denied: number } {
        return { keys: this.buckets.size, allowed: this.allowedTotal, denied: this.deniedTotal };
    }

    private getBucket(key: string, now: number): RateLimitBucket {
        let bucket = this.buckets.get(key);
        if (bucket) {
            // Refresh recency
            this.buckets.delete(key);
            this.buckets.set(key, bucket);
            return bucket;
        }

        bucket = {
            key,
            tokens: this.zone.capacity,
            capacity: this.zone.capacity,
            refillRatePerSecond: this.zone.refillRatePerSecond,
            lastRefillTimestamp: now
        };
        this.buckets.set(key, bucket);

        if (this.buckets.size > this.zone.maxKeys) {
            const oldest = this.buckets.keys().next();
            if (!oldest.done) this.buckets.delete(oldest.value);
        }
        return bucket;
    }
}
