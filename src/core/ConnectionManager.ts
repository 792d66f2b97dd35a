import http from 'http';
import { Socket } from 'net';

import { HeaderList, UpstreamServer } from '../types/models';
import { createLogger } from '../utils/logger';
import {
    ClientAbortError,
    TimeoutPhase,
    UpstreamConnectError,
    UpstreamResetError,
    UpstreamTimeoutError
} from './errors';

const logger = createLogger('ConnectionManager');

export interface UpstreamRequest {
    method: string;
    path: string; // path plus query string
    headers: HeaderList;
    body: Buffer;
}

export interface UpstreamResponse {
    status: number;
    headers: HeaderList;
    body: Buffer;
}

export interface Timeouts {
    connectTimeoutMs: number;
    sendTimeoutMs: number;
    readTimeoutMs: number;
}

export interface UpstreamTransport {
    request(server: UpstreamServer, request: UpstreamRequest, timeouts: Timeouts, signal: AbortSignal): Promise<UpstreamResponse>;
    destroy(): void;
}

export interface ConnectionPoolConfig {
    maxSockets: number;
    maxFreeSockets: number;
    keepAliveMsecs: number;
}

export const DEFAULT_POOL_CONFIG: ConnectionPoolConfig = {
    maxSockets: 256,
    maxFreeSockets: 32,
    keepAliveMsecs: 1000
};

function toOutgoingHeaders(headers: HeaderList): http.OutgoingHttpHeaders {
    const out: Record<string, string | string[]> = {};
    for (const [name, value] of headers) {
        const existing = out[name];
        if (existing === undefined) out[name] = value;
        else if (Array.isArray(existing)) existing.push(value);
        else out[name] = [existing, value];
    }
    return out;
}

function toHeaderList(rawHeaders: string[]): HeaderList {
    const list: HeaderList = [];
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
        list.push([rawHeaders[i], rawHeaders[i + 1]]);
    }
    return list;
}

/**
 * Node `http` transport with one keep-alive agent per upstream address.
 * The whole response is buffered before resolving so the caller can decide
 * to retry or cache it.
 */
export class HttpTransport implements UpstreamTransport {
    private agents = new Map<string, http.Agent>();

    constructor(private readonly config: ConnectionPoolConfig = DEFAULT_POOL_CONFIG) { }

    request(server: UpstreamServer, request: UpstreamRequest, timeouts: Timeouts, signal: AbortSignal): Promise<UpstreamResponse> {
        return new Promise((resolve, reject) => {
            if (signal.aborted) {
                reject(new ClientAbortError());
                return;
            }

            let phase: TimeoutPhase = 'connect';
            let connected = false;
            let timer: NodeJS.Timeout | undefined;
            let done = false;

            const req = http.request({
                host: server.host,
                port: server.port,
                method: request.method,
                path: request.path,
                headers: toOutgoingHeaders(request.headers),
                agent: this.getAgent(server)
            });

            const finish = (err: Error | null, response?: UpstreamResponse) => {
                if (done) return;
                done = true;
                if (timer) clearTimeout(timer);
                signal.removeEventListener('abort', onAbort);

                if (err) {
                    req.destroy();
                    reject(err);
                } else if (response) {
                    resolve(response);
                }
            };

            const arm = (next: TimeoutPhase, ms: number) => {
                phase = next;
                if (timer) clearTimeout(timer);
                timer = setTimeout(() => finish(new UpstreamTimeoutError(server.address, next)), ms);
            };

            const onAbort = () => finish(new ClientAbortError());
            signal.addEventListener('abort', onAbort, { once: true });

            req.on('socket', (socket: Socket) => {
                if (socket.connecting) {
                    arm('connect', timeouts.connectTimeoutMs);
                    socket.once('connect', () => {
                        connected = true;
                        if (phase === 'connect') arm('send', timeouts.sendTimeoutMs);
                    });
                } else {
                    // Reused keep-alive socket
                    connected = true;
                    arm('send', timeouts.sendTimeoutMs);
                }
            });

            req.on('finish', () => {
                if (phase !== 'read') arm('read', timeouts.readTimeoutMs);
            });

            req.on('response', (res) => {
                const chunks: Buffer[] = [];
                arm('read', timeouts.readTimeoutMs);

                res.on('data', (chunk: Buffer) => {
                    chunks.push(chunk);
                    arm('read', timeouts.readTimeoutMs);
                });
                res.on('end', () => {
                    finish(null, {
                        status: res.statusCode ?? 502,
                        headers: toHeaderList(res.rawHeaders),
                        body: Buffer.concat(chunks)
                    });
                });
                res.on('error', (err) => finish(new UpstreamResetError(server.address, err.message)));
                res.on('aborted', () => finish(new UpstreamResetError(server.address, 'response aborted')));
            });

            req.on('error', (err: Error) => {
                const cause = 'code' in err && typeof err.code === 'string' ? err.code : err.message;
                finish(connected
                    ? new UpstreamResetError(server.address, cause)
                    : new UpstreamConnectError(server.address, cause));
            });

            req.end(request.body.length > 0 ? request.body : undefined);
        });
    }

    destroy(): void {
        for (const agent of this.agents.values()) {
            agent.destroy();
        }
        this.agents.clear();
    }

    stats(): { agents: number; sockets: number; freeSockets: number } {
        let sockets = 0;
        let freeSockets = 0;
        for (const agent of this.agents.values()) {
            for (const list of Object.values(agent.sockets)) sockets += list?.length ?? 0;
            for (const list of Object.values(agent.freeSockets)) freeSockets += list?.length ?? 0;
        }
        return { agents: this.agents.size, sockets, freeSockets };
    }

    private getAgent(server: UpstreamServer): http.Agent {
        let agent = this.agents.get(server.address);
        if (!agent) {
            agent = new http.Agent({
                keepAlive: true,
                keepAliveMsecs: this.config.keepAliveMsecs,
                maxSockets: this.config.maxSockets,
                maxFreeSockets: this.config.maxFreeSockets
            });
            this.agents.set(server.address, agent);
            logger.debug({ upstream: server.address }, 'Created keep-alive agent');
        }
        return agent;
    }
}

/**
 * Owns upstream connections and the per-server active connection count
 * that least-connections balancing reads.
 */
export class ConnectionManager {
    constructor(private readonly transport: UpstreamTransport = new HttpTransport()) { }

    async send(server: UpstreamServer, request: UpstreamRequest, timeouts: Timeouts, signal: AbortSignal): Promise<UpstreamResponse> {
        server.activeConnectionCount++;
        try {
            return await this.transport.request(server, request, timeouts, signal);
        } finally {
            server.activeConnectionCount = Math.max(0, server.activeConnectionCount - 1);
        }
    }

    destroy(): void {
        this.transport.destroy();
    }
}
