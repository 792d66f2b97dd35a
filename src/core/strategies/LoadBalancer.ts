import { UpstreamServer } from '../../types/models';
import { fnv1a, ringHash } from '../../utils/hash';
import { UpstreamPool } from '../UpstreamPool';

export interface SelectionContext {
    /** Client address or other affinity key, used by the hashing strategies. */
    clientKey?: string;
    /** Servers already tried by this request. */
    excluded?: ReadonlySet<string>;
    isEligible(server: UpstreamServer): boolean;
}

type Candidate = (server: UpstreamServer) => boolean;

export abstract class LoadBalancer {
    constructor(protected readonly pool: UpstreamPool) { }

    /**
     * Returns null when nothing is eligible (no healthy upstream).
     *
     * Primaries are used while at least one of them is eligible. When none is,
     * every backup not already tried by this request becomes a candidate
     * regardless of its own health.
     */
    select(ctx: SelectionContext): UpstreamServer | null {
        const excluded = ctx.excluded;
        const notExcluded: Candidate = s => !excluded || !excluded.has(s.address);
        const primary: Candidate = s => notExcluded(s) && ctx.isEligible(s);

        if (this.pool.primaries.some(primary)) {
            return this.choose(this.pool.primaries, primary, ctx);
        }
        if (this.pool.backups.some(notExcluded)) {
            return this.choose(this.pool.backups, notExcluded, ctx);
        }
        return null;
    }

    /** `members` is never empty and at least one member satisfies `candidate`. */
    protected abstract choose(members: readonly UpstreamServer[], candidate: Candidate, ctx: SelectionContext): UpstreamServer | null;
}

export class RoundRobinLoadBalancer extends LoadBalancer {
    private counter = 0;

    protected choose(members: readonly UpstreamServer[], candidate: Candidate): UpstreamServer | null {
        const start = this.advance() % members.length;
        for (let i = 0; i < members.length; i++) {
            const server = members[(start + i) % members.length];
            if (candidate(server)) return server;
        }
        return null;
    }

    // One logical position per call, whether or not the slot was skipped
    protected advance(): number {
        const current = this.counter;
        this.counter = this.counter >= Number.MAX_SAFE_INTEGER ? 0 : this.counter + 1;
        return current;
    }
}

/**
 * Smooth weighted round-robin: weights [3, 2, 1] produce A B A C B A rather
 * than A A A B B C.
 */
export class WeightedRoundRobinLoadBalancer extends LoadBalancer {
    private currentWeights = new Map<string, number>();

    protected choose(members: readonly UpstreamServer[], candidate: Candidate): UpstreamServer | null {
        let total = 0;
        let best: UpstreamServer | null = null;
        let bestWeight = -Infinity;

        for (const server of members) {
            if (!candidate(server)) continue;

            const weight = (this.currentWeights.get(server.address) ?? 0) + server.weight;
            this.currentWeights.set(server.address, weight);
            total += server.weight;

            if (weight > bestWeight) {
                best = server;
                bestWeight = weight;
            }
        }

        if (best) {
            this.currentWeights.set(best.address, bestWeight - total);
        }
        return best;
    }
}

export class LeastConnectionsLoadBalancer extends RoundRobinLoadBalancer {
    protected choose(members: readonly UpstreamServer[], candidate: Candidate): UpstreamServer | null {
        const start = this.advance() % members.length;
        let best: UpstreamServer | null = null;

        // Scanning from the cursor makes ties fall to round-robin order
        for (let i = 0; i < members.length; i++) {
            const server = members[(start + i) % members.length];
            if (!candidate(server)) continue;
            if (!best || server.activeConnectionCount < best.activeConnectionCount) {
                best = server;
            }
        }
        return best;
    }
}

export class IPHashLoadBalancer extends LoadBalancer {
    protected choose(members: readonly UpstreamServer[], candidate: Candidate, ctx: SelectionContext): UpstreamServer | null {
        const alive = members.filter(candidate);
        if (alive.length === 0) return null;

        const key = ctx.clientKey || '0.0.0.0';
        return alive[fnv1a(key) % alive.length];
    }
}

interface RingPoint {
    hash: number;
    server: UpstreamServer;
}

/**
 * Hash ring with virtual nodes. The ring covers every member whatever its
 * health; lookups walk clockwise past ineligible servers, so a server going
 * down only moves the keys it owned.
 */
export class ConsistentHashLoadBalancer extends LoadBalancer {
    static readonly VIRTUAL_NODES_PER_WEIGHT = 160;

    private rings = new WeakMap<readonly UpstreamServer[], RingPoint[]>();

    protected choose(members: readonly UpstreamServer[], candidate: Candidate, ctx: SelectionContext): UpstreamServer | null {
        const ring = this.getRing(members);
        const hash = ringHash(ctx.clientKey || '0.0.0.0');

        // First point clockwise from the key
        let lo = 0;
        let hi = ring.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (ring[mid].hash < hash) lo = mid + 1;
            else hi = mid;
        }

        for (let i = 0; i < ring.length; i++) {
            const point = ring[(lo + i) % ring.length];
            if (candidate(point.server)) return point.server;
        }
        return null;
    }

    private getRing(members: readonly UpstreamServer[]): RingPoint[] {
        let ring = this.rings.get(members);
        if (!ring) {
            ring = [];
            for (const server of members) {
                const vnodes = ConsistentHashLoadBalancer.VIRTUAL_NODES_PER_WEIGHT * server.weight;
                for (let i = 0; i < vnodes; i++) {
                    ring.push({ hash: ringHash(`${server.address}#${i}`), server });
                }
            }
            ring.sort((a, b) => a.hash - b.hash);
            this.rings.set(members, ring);
        }
        return ring;
    }
}
