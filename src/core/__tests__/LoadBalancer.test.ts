import { BalancingStrategy, PoolConfig, UpstreamServer } from '../../types/models';
import {
    ConsistentHashLoadBalancer,
    IPHashLoadBalancer,
    LeastConnectionsLoadBalancer,
    RoundRobinLoadBalancer,
    SelectionContext,
    WeightedRoundRobinLoadBalancer
} from '../strategies/LoadBalancer';
import { UpstreamPool } from '../UpstreamPool';

function pool(servers: PoolConfig['servers'], strategy = BalancingStrategy.ROUND_ROBIN): UpstreamPool {
    return new UpstreamPool({
        servers,
        strategy,
        maxFails: 1,
        failTimeoutSeconds: 10,
        probeIntervalSeconds: 0,
        probePath: '/'
    });
}

const healthy = (s: UpstreamServer) => s.state === 'healthy';

function ctx(extra: Partial<SelectionContext> = {}): SelectionContext {
    return { isEligible: healthy, ...extra };
}

function pick(lb: { select(ctx: SelectionContext): UpstreamServer | null }, context: SelectionContext, times: number): Array<string | undefined> {
    const picks: Array<string | undefined> = [];
    for (let i = 0; i < times; i++) {
        picks.push(lb.select(context)?.address);
    }
    return picks;
}

describe('RoundRobinLoadBalancer', () => {
    const threeServers = [{ address: 'a:80' }, { address: 'b:80' }, { address: 'c:80' }];

    test('should cycle through servers in order', () => {
        const lb = new RoundRobinLoadBalancer(pool(threeServers));
        expect(pick(lb, ctx(), 6)).toEqual(['a:80', 'b:80', 'c:80', 'a:80', 'b:80', 'c:80']);
    });

    test('should spread N*k requests evenly', () => {
        const lb = new RoundRobinLoadBalancer(pool(threeServers));
        const counts = new Map<string | undefined, number>();
        for (const address of pick(lb, ctx(), 30)) {
            counts.set(address, (counts.get(address) ?? 0) + 1);
        }
        expect(counts.get('a:80')).toBe(10);
        expect(counts.get('b:80')).toBe(10);
        expect(counts.get('c:80')).toBe(10);
    });

    test('should skip unhealthy servers', () => {
        const p = pool(threeServers);
        p.servers[1].state = 'unhealthy';
        const lb = new RoundRobinLoadBalancer(p);
        expect(pick(lb, ctx(), 4)).toEqual(['a:80', 'c:80', 'c:80', 'a:80']);
    });

    test('should skip servers already tried by the request', () => {
        const lb = new RoundRobinLoadBalancer(pool(threeServers));
        lb.select(ctx()); // a
        expect(lb.select(ctx({ excluded: new Set(['b:80']) }))?.address).toBe('c:80');
    });

    test('should return null when every server is excluded', () => {
        const lb = new RoundRobinLoadBalancer(pool(threeServers));
        expect(lb.select(ctx({ excluded: new Set(['a:80', 'b:80', 'c:80']) }))).toBeNull();
    });

    test('should use backups only when no primary is eligible', () => {
        const p = pool([{ address: 'a:80' }, { address: 'b:80', role: 'backup' }]);
        const lb = new RoundRobinLoadBalancer(p);

        expect(pick(lb, ctx(), 2)).toEqual(['a:80', 'a:80']);

        p.servers[0].state = 'unhealthy';
        expect(lb.select(ctx())?.address).toBe('b:80');

        // Backups are tried even when marked unhealthy themselves
        p.servers[1].state = 'unhealthy';
        expect(lb.select(ctx())?.address).toBe('b:80');
        expect(lb.select(ctx({ excluded: new Set(['b:80']) }))).toBeNull();
    });
});

describe('WeightedRoundRobinLoadBalancer', () => {
    const weighted = [
        { address: 'a:80', weight: 3 },
        { address: 'b:80', weight: 2 },
        { address: 'c:80', weight: 1 }
    ];

    test('should interleave picks in proportion to weight', () => {
        const lb = new WeightedRoundRobinLoadBalancer(pool(weighted, BalancingStrategy.WEIGHTED_ROUND_ROBIN));
        expect(pick(lb, ctx(), 6)).toEqual(['a:80', 'b:80', 'a:80', 'c:80', 'b:80', 'a:80']);
        expect(pick(lb, ctx(), 6)).toEqual(['a:80', 'b:80', 'a:80', 'c:80', 'b:80', 'a:80']);
    });

    test('should give a 3:2:1 split over many requests', () => {
        const lb = new WeightedRoundRobinLoadBalancer(pool(weighted, BalancingStrategy.WEIGHTED_ROUND_ROBIN));
        const picks = pick(lb, ctx(), 600);
        expect(picks.filter(a => a === 'a:80')).toHaveLength(300);
        expect(picks.filter(a => a === 'b:80')).toHaveLength(200);
        expect(picks.filter(a => a === 'c:80')).toHaveLength(100);
    });

    test('should leave out ineligible servers', () => {
        const p = pool(weighted, BalancingStrategy.WEIGHTED_ROUND_ROBIN);
        p.servers[0].state = 'unhealthy';
        const lb = new WeightedRoundRobinLoadBalancer(p);
        expect(pick(lb, ctx(), 3)).toEqual(['b:80', 'c:80', 'b:80']);
    });
});

describe('LeastConnectionsLoadBalancer', () => {
    test('should pick the server with the fewest active connections', () => {
        const p = pool([{ address: 'a:80' }, { address: 'b:80' }, { address: 'c:80' }], BalancingStrategy.LEAST_CONNECTIONS);
        p.servers[0].activeConnectionCount = 2;
        p.servers[1].activeConnectionCount = 0;
        p.servers[2].activeConnectionCount = 1;
        const lb = new LeastConnectionsLoadBalancer(p);
        expect(lb.select(ctx())?.address).toBe('b:80');
    });

    test('should break ties in round-robin order', () => {
        const lb = new LeastConnectionsLoadBalancer(pool([{ address: 'a:80' }, { address: 'b:80' }, { address: 'c:80' }], BalancingStrategy.LEAST_CONNECTIONS));
        expect(pick(lb, ctx(), 4)).toEqual(['a:80', 'b:80', 'c:80', 'a:80']);
    });
});

describe('IPHashLoadBalancer', () => {
    test('should send one client to the same server', () => {
        const lb = new IPHashLoadBalancer(pool([{ address: 'a:80' }, { address: 'b:80' }, { address: 'c:80' }], BalancingStrategy.IP_HASH));
        const first = lb.select(ctx({ clientKey: '192.168.1.20' }))?.address;
        expect(first).toBeDefined();
        expect(pick(lb, ctx({ clientKey: '192.168.1.20' }), 5)).toEqual([first, first, first, first, first]);
    });

    test('should never pick an ineligible server', () => {
        const p = pool([{ address: 'a:80' }, { address: 'b:80' }], BalancingStrategy.IP_HASH);
        p.servers[0].state = 'unhealthy';
        const lb = new IPHashLoadBalancer(p);
        for (let i = 0; i < 20; i++) {
            expect(lb.select(ctx({ clientKey: `10.0.0.${i}` }))?.address).toBe('b:80');
        }
    });
});

describe('ConsistentHashLoadBalancer', () => {
    const servers = [{ address: 'a:80' }, { address: 'b:80' }, { address: 'c:80' }];

    test('should map a key to the same server every time', () => {
        const lb = new ConsistentHashLoadBalancer(pool(servers, BalancingStrategy.CONSISTENT_HASH));
        const first = lb.select(ctx({ clientKey: 'user-42' }))?.address;
        expect(pick(lb, ctx({ clientKey: 'user-42' }), 3)).toEqual([first, first, first]);
    });

    test('should only move the keys of a server that goes down', () => {
        const p = pool(servers, BalancingStrategy.CONSISTENT_HASH);
        const lb = new ConsistentHashLoadBalancer(p);

        const keys = Array.from({ length: 200 }, (_, i) => `client-${i}`);
        const before = keys.map(k => lb.select(ctx({ clientKey: k }))?.address);

        p.servers[1].state = 'unhealthy';
        const after = keys.map(k => lb.select(ctx({ clientKey: k }))?.address);

        keys.forEach((_, i) => {
            if (before[i] === 'b:80') {
                expect(after[i]).not.toBe('b:80');
            } else {
                expect(after[i]).toBe(before[i]);
            }
        });
        expect(before.filter(a => a === 'b:80').length).toBeGreaterThan(0);
    });
});
