import { Clock, ProxyRequest } from '../types/models';

export type CacheStatus = 'HIT' | 'MISS' | 'STALE' | 'UPDATING' | 'BYPASS';

export interface RouteStats {
    requestsTotal: number;
    requestsActive: number;
    errorsTotal: number;
    errorsByCode: Record<string, number>;
    abortedTotal: number;
    retriesTotal: number;
    cache: Record<CacheStatus, number>;
    avgLatencyMs: number;
}

export class Tracker {
    private stats: Map<string, RouteStats> = new Map();

    constructor(private readonly now: Clock = Date.now) { }

    private getStats(vHost: string): RouteStats {
        let s = this.stats.get(vHost);
        if (!s) {
            s = {
                requestsTotal: 0,
                requestsActive: 0,
                errorsTotal: 0,
                errorsByCode: {},
                abortedTotal: 0,
                retriesTotal: 0,
                cache: { HIT: 0, MISS: 0, STALE: 0, UPDATING: 0, BYPASS: 0 },
                avgLatencyMs: 0
            };
            this.stats.set(vHost, s);
        }
        return s;
    }

    trackRequestStart(vHost: string): void {
        const s = this.getStats(vHost);
        s.requestsTotal++;
        s.requestsActive++;
    }

    trackRequestEnd(req: ProxyRequest, success: boolean): void {
        const s = this.getStats(req.meta.vHost);
        s.requestsActive = Math.max(0, s.requestsActive - 1);

        if (!success) {
            s.errorsTotal++;
        }
        if (req.attempts > 1) {
            s.retriesTotal += req.attempts - 1;
        }

        const duration = this.now() - req.startTime;
        // Simple moving average for latency
        s.avgLatencyMs = (s.avgLatencyMs * 0.9) + (duration * 0.1);
    }

    trackError(vHost: string, errorCode: string): void {
        const s = this.getStats(vHost);
        s.errorsByCode[errorCode] = (s.errorsByCode[errorCode] ?? 0) + 1;
    }

    trackAbort(vHost: string): void {
        this.getStats(vHost).abortedTotal++;
    }

    trackCache(vHost: string, status: CacheStatus): void {
        this.getStats(vHost).cache[status]++;
    }

    getAllStats(): Map<string, RouteStats> {
        return this.stats;
    }

    getRouteStats(vHost: string): RouteStats | undefined {
        return this.stats.get(vHost);
    }

    removeStats(vHost: string): void {
        this.stats.delete(vHost);
    }
}
