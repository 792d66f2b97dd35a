/**
 * Error taxonomy for the request path. Every error carries the status code the
 * client sees when it surfaces, and a stable code used in JSON error bodies.
 */
export class ProxyError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly statusCode: number
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class RateLimitedError extends ProxyError {
    constructor(public readonly retryAfterSeconds: number) {
        super('Too many requests', 'RATE_LIMITED', 429);
    }
}

export class NoHealthyUpstreamError extends ProxyError {
    constructor(vHost: string) {
        super(`No healthy upstream for ${vHost}`, 'NO_HEALTHY_UPSTREAM', 503);
    }
}

/** Base for failures that count against an upstream and may be retried. */
export class UpstreamError extends ProxyError {
    constructor(message: string, code: string, public readonly address: string) {
        super(message, code, 502);
    }
}

export class UpstreamConnectError extends UpstreamError {
    constructor(address: string, cause: string) {
        super(`Connect to ${address} failed: ${cause}`, 'UPSTREAM_CONNECT_FAILED', address);
    }
}

/** The connection dropped after it was established, before a full response arrived. */
export class UpstreamResetError extends UpstreamError {
    constructor(address: string, cause: string) {
        super(`Connection to ${address} broke: ${cause}`, 'UPSTREAM_RESET', address);
    }
}

export type TimeoutPhase = 'connect' | 'send' | 'read';

export class UpstreamTimeoutError extends UpstreamError {
    constructor(address: string, public readonly phase: TimeoutPhase) {
        super(`${phase} timeout talking to ${address}`, 'UPSTREAM_TIMEOUT', address);
    }
}

export class UpstreamBadResponseError extends UpstreamError {
    constructor(address: string, public readonly status: number) {
        super(`Upstream ${address} answered ${status}`, 'UPSTREAM_BAD_RESPONSE', address);
    }
}

export class UpstreamExhaustedError extends ProxyError {
    constructor(attempts: number) {
        super(`All ${attempts} upstream attempts failed`, 'UPSTREAM_ERROR', 502);
    }
}

/** The client went away; nothing is written and nothing is recorded against the upstream. */
export class ClientAbortError extends ProxyError {
    constructor() {
        super('Client closed the connection', 'CLIENT_ABORTED', 499);
    }
}

export class PayloadTooLargeError extends ProxyError {
    constructor(limit: number) {
        super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE', 413);
    }
}

export class CacheStoreError extends ProxyError {
    constructor(message: string) {
        super(message, 'CACHE_STORE_FAILURE', 500);
    }
}

export class ConfigError extends ProxyError {
    constructor(message: string) {
        super(message, 'INVALID_CONFIG', 400);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
