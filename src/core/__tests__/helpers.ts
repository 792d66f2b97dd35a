import { parseRouteConfig } from '../../config';
import { HeaderList, InboundRequest, RouteConfig, UpstreamServer } from '../../types/models';
import { Timeouts, UpstreamRequest, UpstreamResponse, UpstreamTransport } from '../ConnectionManager';

export interface ManualClock {
    now: () => number;
    advance(ms: number): void;
}

export function manualClock(start = 1_000_000): ManualClock {
    let current = start;
    return {
        now: () => current,
        advance(ms: number) {
            current += ms;
        }
    };
}

/** Route config through the real schema so every default applies. */
export function routeConfig(input: Record<string, unknown>): RouteConfig {
    return parseRouteConfig({ vHost: 'test.com', ...input });
}

export function request(partial: Partial<InboundRequest> = {}): InboundRequest {
    return {
        method: 'GET',
        scheme: 'http',
        host: 'test.com',
        path: '/',
        query: '',
        headers: [['Host', 'test.com']],
        body: Buffer.alloc(0),
        clientAddress: '10.0.0.1',
        receivedAt: 0,
        ...partial
    };
}

export function reply(status: number, body = '', headers: HeaderList = []): UpstreamResponse {
    return { status, headers, body: Buffer.from(body) };
}

export interface TransportCall {
    address: string;
    request: UpstreamRequest;
    timeouts: Timeouts;
}

export type FakeHandler = (server: UpstreamServer, request: UpstreamRequest, signal: AbortSignal) => Promise<UpstreamResponse> | UpstreamResponse;

/** In-process upstream: records every call and answers through `handler`. */
export class FakeTransport implements UpstreamTransport {
    calls: TransportCall[] = [];
    destroyed = false;

    constructor(public handler: FakeHandler = () => reply(200, 'ok')) { }

    async request(server: UpstreamServer, request: UpstreamRequest, timeouts: Timeouts, signal: AbortSignal): Promise<UpstreamResponse> {
        this.calls.push({ address: server.address, request, timeouts });
        return this.handler(server, request, signal);
    }

    addresses(): string[] {
        return this.calls.map(c => c.address);
    }

    destroy(): void {
        this.destroyed = true;
    }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (err: unknown) => void } {
    let resolve: (value: T) => void = () => undefined;
    let reject: (err: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

export function header(headers: HeaderList, name: string): string | undefined {
    const lower = name.toLowerCase();
    return headers.find(([k]) => k.toLowerCase() === lower)?.[1];
}
