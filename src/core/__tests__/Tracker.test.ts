import { ProxyRequest } from '../../types/models';
import { Tracker } from '../Tracker';
import { manualClock, request } from './helpers';

describe('Tracker', () => {
    let tracker: Tracker;
    const clock = manualClock();
    const vHost = 'test.com';

    const proxyRequest = (attempts = 1): ProxyRequest => ({
        id: '1',
        request: request(),
        startTime: clock.now() - 100,
        deadline: clock.now() + 30_000,
        attempts,
        excluded: new Set(),
        meta: { vHost, clientIp: '127.0.0.1' }
    });

    beforeEach(() => {
        tracker = new Tracker(clock.now);
    });

    test('should track request start', () => {
        tracker.trackRequestStart(vHost);
        const stats = tracker.getRouteStats(vHost);
        expect(stats?.requestsTotal).toBe(1);
        expect(stats?.requestsActive).toBe(1);
    });

    test('should track request end (success)', () => {
        tracker.trackRequestStart(vHost);
        tracker.trackRequestEnd(proxyRequest(), true);

        const stats = tracker.getRouteStats(vHost);
        expect(stats?.requestsActive).toBe(0);
        expect(stats?.errorsTotal).toBe(0);
        expect(stats?.avgLatencyMs).toBeCloseTo(10);
    });

    test('should track request end (failure)', () => {
        tracker.trackRequestStart(vHost);
        tracker.trackRequestEnd(proxyRequest(), false);

        const stats = tracker.getRouteStats(vHost);
        expect(stats?.errorsTotal).toBe(1);
    });

    test('should count retries beyond the first attempt', () => {
        tracker.trackRequestStart(vHost);
        tracker.trackRequestEnd(proxyRequest(3), true);
        expect(tracker.getRouteStats(vHost)?.retriesTotal).toBe(2);
    });

    test('should track explicit errors by code', () => {
        tracker.trackError(vHost, 'RATE_LIMITED');
        tracker.trackError(vHost, 'RATE_LIMITED');
        const stats = tracker.getRouteStats(vHost);
        expect(stats?.errorsByCode).toEqual({ RATE_LIMITED: 2 });
        expect(stats?.errorsTotal).toBe(0);
    });

    test('should track aborts and cache outcomes', () => {
        tracker.trackAbort(vHost);
        tracker.trackCache(vHost, 'HIT');
        tracker.trackCache(vHost, 'HIT');
        tracker.trackCache(vHost, 'MISS');

        const stats = tracker.getRouteStats(vHost);
        expect(stats?.abortedTotal).toBe(1);
        expect(stats?.cache).toEqual({ HIT: 2, MISS: 1, STALE: 0, UPDATING: 0, BYPASS: 0 });
    });

    test('should return all stats', () => {
        tracker.trackRequestStart('host1');
        tracker.trackRequestStart('host2');
        const allStats = tracker.getAllStats();
        expect(allStats.size).toBe(2);
    });

    test('should remove stats', () => {
        tracker.trackRequestStart(vHost);
        tracker.removeStats(vHost);
        expect(tracker.getRouteStats(vHost)).toBeUndefined();
    });
});
