import { EventEmitter } from 'events';

import { BalancingStrategy, Clock, RouteConfig, UpstreamServer } from '../types/models';
import { CachePolicy } from './cache';
import { HealthChecker, HealthProbe, StateChange } from './HealthChecker';
import { RateLimiter } from './RateLimiter';
import {
    ConsistentHashLoadBalancer,
    IPHashLoadBalancer,
    LeastConnectionsLoadBalancer,
    LoadBalancer,
    RoundRobinLoadBalancer,
    WeightedRoundRobinLoadBalancer
} from './strategies/LoadBalancer';
import { UpstreamPool, UpstreamStatus } from './UpstreamPool';

export interface RouteOptions {
    now?: Clock;
    probe?: HealthProbe;
}

/**
 * Everything one virtual host needs to proxy a request: its upstream pool,
 * the balancer picked for it, health tracking, cache rules and rate limit.
 */
export class Route extends EventEmitter {
    readonly pool: UpstreamPool;
    readonly health: HealthChecker;
    readonly cachePolicy: CachePolicy;
    readonly rateLimiter?: RateLimiter;

    private lb: LoadBalancer;

    constructor(public readonly config: RouteConfig, options: RouteOptions = {}) {
        super();
        this.pool = new UpstreamPool(config.pool);
        this.lb = this.createLoadBalancer(config.pool.strategy, this.pool);
        this.health = new HealthChecker(this.pool, {
            badStatusCodes: config.proxy.badStatusCodes,
            probe: options.probe,
            now: options.now
        });
        this.cachePolicy = new CachePolicy(config.cache);
        if (config.rateLimit) {
            this.rateLimiter = new RateLimiter(config.rateLimit, options.now);
        }

        this.health.on('state-change', (change: StateChange) => this.emit('upstream-state', change));
        this.health.start();
    }

    private createLoadBalancer(strategy: BalancingStrategy, pool: UpstreamPool): LoadBalancer {
        switch (strategy) {
            case BalancingStrategy.ROUND_ROBIN:
                return new RoundRobinLoadBalancer(pool);
            case BalancingStrategy.WEIGHTED_ROUND_ROBIN:
                return new WeightedRoundRobinLoadBalancer(pool);
            case BalancingStrategy.LEAST_CONNECTIONS:
                return new LeastConnectionsLoadBalancer(pool);
            case BalancingStrategy.IP_HASH:
                return new IPHashLoadBalancer(pool);
            case BalancingStrategy.CONSISTENT_HASH:
                return new ConsistentHashLoadBalancer(pool);
            default:
                return new RoundRobinLoadBalancer(pool);
        }
    }

    get vHost(): string {
        return this.config.vHost;
    }

    getNextUpstream(clientKey?: string, excluded?: ReadonlySet<string>): UpstreamServer | null {
        return this.lb.select({
            clientKey,
            excluded,
            isEligible: server => this.health.isEligible(server)
        });
    }

    status(): UpstreamStatus[] {
        return this.pool.status();
    }

    stop(): void {
        this.health.stop();
        this.health.removeAllListeners();
    }
}
