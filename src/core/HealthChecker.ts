import { EventEmitter } from 'events';
import http from 'http';

import { Clock, UpstreamServer, UpstreamState } from '../types/models';
import { createLogger } from '../utils/logger';
import { errorMessage } from './errors';
import { UpstreamPool } from './UpstreamPool';

const logger = createLogger('HealthChecker');

/** Resolves with the probe response status, rejects when the upstream is unreachable. */
export type HealthProbe = (server: UpstreamServer, path: string, timeoutMs: number) => Promise<number>;

export interface HealthCheckerOptions {
    badStatusCodes: number[];
    probe?: HealthProbe;
    now?: Clock;
}

export interface StateChange {
    address: string;
    from: UpstreamState;
    to: UpstreamState;
    reason: 'failures' | 'probe' | 'traffic';
}

export const httpProbe: HealthProbe = (server, path, timeoutMs) => new Promise((resolve, reject) => {
    const req = http.request({
        hostname: server.host,
        port: server.port,
        path,
        method: 'GET',
        timeout: timeoutMs,
        headers: { 'user-agent': 'upstream-health-probe' }
    }, (res) => {
        res.resume(); // Consume response data
        resolve(res.statusCode ?? 0);
    });

    req.on('error', reject);
    req.on('timeout', () => {
        req.destroy(new Error(`Probe timed out after ${timeoutMs}ms`));
    });

    req.end();
});

/**
 * Tracks upstream health for one pool.
 *
 * Passive: every forwarded attempt reports success or failure. `maxFails`
 * failures inside one `failTimeoutSeconds` window take a server out; once the
 * window has passed since its last failure it is eligible again on probation,
 * and the next live request decides.
 *
 * Active: when a probe interval is configured, unhealthy servers past their
 * fail timeout are probed on a timer.
 */
export class HealthChecker extends EventEmitter {
    private readonly badStatus: Set<number>;
    private readonly probe: HealthProbe;
    private readonly now: Clock;

    private probeInterval: NodeJS.Timeout | null = null;
    private probing = false;

    constructor(private readonly pool: UpstreamPool, options: HealthCheckerOptions) {
        super();
        this.badStatus = new Set(options.badStatusCodes);
        this.probe = options.probe ?? httpProbe;
        this.now = options.now ?? Date.now;
    }

    isBadStatus(status: number): boolean {
        return this.badStatus.has(status);
    }

    isProbationary(server: UpstreamServer): boolean {
        return server.state === 'unhealthy'
            && this.now() - server.lastFailureTimestamp >= this.pool.failTimeoutSeconds * 1000;
    }

    isEligible(server: UpstreamServer): boolean {
        return server.state === 'healthy' || this.isProbationary(server);
    }

    reportSuccess(server: UpstreamServer): void {
        server.currentFailureCount = 0;
        if (server.state === 'unhealthy') {
            this.transition(server, 'healthy', 'traffic');
        }
    }

    reportFailure(server: UpstreamServer): void {
        const now = this.now();
        const windowMs = this.pool.failTimeoutSeconds * 1000;

        // Failures only accumulate inside one fail_timeout window
        if (server.state === 'healthy' && server.lastFailureTimestamp > 0 && now - server.lastFailureTimestamp > windowMs) {
            server.currentFailureCount = 0;
        }

        server.currentFailureCount++;
        server.lastFailureTimestamp = now;

        if (server.state === 'healthy' && server.currentFailureCount >= this.pool.maxFails) {
            this.transition(server, 'unhealthy', 'failures');
        } else if (server.state === 'unhealthy') {
            logger.warn({ upstream: server.address, failures: server.currentFailureCount }, 'Probationary request failed');
        }
    }

    /**
     * Probes every unhealthy server whose fail timeout has passed. A server
     * still inside its window is left alone. Overlapping runs are skipped.
     */
    async probeOnce(): Promise<void> {
        if (this.probing) return;
        this.probing = true;

        const timeoutMs = Math.min(2000, Math.max(1, this.pool.probeIntervalSeconds) * 1000);
        const targets = this.pool.servers.filter(s => this.isProbationary(s));

        try {
            await Promise.all(targets.map(async (server) => {
                try {
                    const status = await this.probe(server, this.pool.probePath, timeoutMs);
                    if (status > 0 && status < 500 && !this.badStatus.has(status)) {
                        this.restore(server);
                    } else {
                        server.lastFailureTimestamp = this.now();
                        logger.debug({ upstream: server.address, status }, 'Probe answered with a bad status');
                    }
                } catch (err) {
                    server.lastFailureTimestamp = this.now();
                    logger.debug({ upstream: server.address, err: errorMessage(err) }, 'Probe failed');
                }
            }));
        } finally {
            this.probing = false;
        }
    }

    start(): void {
        if (this.probeInterval || this.pool.probeIntervalSeconds <= 0) return;

        this.probeInterval = setInterval(() => {
            this.probeOnce().catch((err: unknown) => {
                logger.error({ err: errorMessage(err) }, 'Probe run failed');
            });
        }, this.pool.probeIntervalSeconds * 1000).unref();
    }

    stop(): void {
        if (this.probeInterval) {
            clearInterval(this.probeInterval);
            this.probeInterval = null;
        }
    }

    private restore(server: UpstreamServer): void {
        server.currentFailureCount = 0;
        server.lastFailureTimestamp = 0;
        if (server.state === 'unhealthy') {
            this.transition(server, 'healthy', 'probe');
        }
    }

    private transition(server: UpstreamServer, to: UpstreamState, reason: StateChange['reason']): void {
        const change: StateChange = { address: server.address, from: server.state, to, reason };
        server.state = to;

        if (to === 'unhealthy') {
            logger.warn({ upstream: server.address, failures: server.currentFailureCount }, 'Upstream marked unhealthy');
        } else {
            logger.info({ upstream: server.address, reason }, 'Upstream recovered');
        }
        this.emit('state-change', change);
    }
}
