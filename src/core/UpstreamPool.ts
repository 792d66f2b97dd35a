import { BalancingStrategy, PoolConfig, UpstreamServer, UpstreamServerConfig } from '../types/models';
import { ConfigError } from './errors';

export interface UpstreamStatus {
    address: string;
    role: UpstreamServer['role'];
    weight: number;
    state: UpstreamServer['state'];
    activeConnectionCount: number;
    currentFailureCount: number;
}

export function parseAddress(address: string): { host: string; port: number } {
    const idx = address.lastIndexOf(':');
    if (idx <= 0 || idx === address.length - 1) {
        throw new ConfigError(`Upstream address must be host:port, got "${address}"`);
    }
    const host = address.slice(0, idx).replace(/^\[(.*)\]$/, '$1');
    const port = Number(address.slice(idx + 1));
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigError(`Invalid port in upstream address "${address}"`);
    }
    return { host, port };
}

export function createUpstreamServer(config: UpstreamServerConfig): UpstreamServer {
    const weight = config.weight ?? 1;
    if (!Number.isInteger(weight) || weight < 1) {
        throw new ConfigError(`Weight of ${config.address} must be a positive integer`);
    }
    const { host, port } = parseAddress(config.address);
    return {
        address: config.address,
        host,
        port,
        weight,
        role: config.role ?? 'primary',
        state: 'healthy',
        currentFailureCount: 0,
        lastFailureTimestamp: 0,
        activeConnectionCount: 0
    };
}

/**
 * The configured set of upstreams for one route. Server order is the
 * round-robin order; primaries and backups keep their relative order.
 */
export class UpstreamPool {
    readonly servers: readonly UpstreamServer[];
    readonly primaries: readonly UpstreamServer[];
    readonly backups: readonly UpstreamServer[];

    readonly strategy: BalancingStrategy;
    readonly maxFails: number;
    readonly failTimeoutSeconds: number;
    readonly probeIntervalSeconds: number;
    readonly probePath: string;

    constructor(config: PoolConfig) {
        const seen = new Set<string>();
        this.servers = config.servers.map(s => {
            if (seen.has(s.address)) {
                throw new ConfigError(`Duplicate upstream ${s.address}`);
            }
            seen.add(s.address);
            return createUpstreamServer(s);
        });
        this.primaries = this.servers.filter(s => s.role === 'primary');
        this.backups = this.servers.filter(s => s.role === 'backup');

        if (this.primaries.length === 0) {
            throw new ConfigError('A pool needs at least one primary upstream');
        }

        this.strategy = config.strategy;
        this.maxFails = config.maxFails;
        this.failTimeoutSeconds = config.failTimeoutSeconds;
        this.probeIntervalSeconds = config.probeIntervalSeconds;
        this.probePath = config.probePath;
    }

    find(address: string): UpstreamServer | undefined {
        return this.servers.find(s => s.address === address);
    }

    status(): UpstreamStatus[] {
        return this.servers.map(s => ({
            address: s.address,
            role: s.role,
            weight: s.weight,
            state: s.state,
            activeConnectionCount: s.activeConnectionCount,
            currentFailureCount: s.currentFailureCount
        }));
    }
}
