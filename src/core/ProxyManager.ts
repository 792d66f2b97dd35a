import * as http from 'http';

import { HeaderList, InboundRequest, OutboundResponse } from '../types/models';
import { createLogger } from '../utils/logger';
import { APIServer } from './APIServer';
import { CacheStore } from './cache';
import { ConnectionManager, HttpTransport, UpstreamTransport } from './ConnectionManager';
import { ClientAbortError, errorMessage, PayloadTooLargeError } from './errors';
import { ProxyEngine } from './ProxyEngine';
import { RouteOptions } from './Route';
import { Router } from './Router';
import { Tracker } from './Tracker';

const logger = createLogger('ProxyManager');

export interface ProxyManagerOptions {
    port: number;
    /** Management API port; the API is not started when omitted. */
    apiPort?: number;
    maxBodyBytes: number;
    cache: {
        maxEntries: number;
        maxBytes: number;
        sweepIntervalMs: number;
    };
    maxBackgroundRefreshes?: number;
    transport?: UpstreamTransport;
    routeOptions?: RouteOptions;
}

export function splitUrl(url: string): { path: string; query: string } {
    const idx = url.indexOf('?');
    if (idx === -1) return { path: url || '/', query: '' };
    return { path: url.slice(0, idx) || '/', query: url.slice(idx + 1) };
}

export function toHeaderList(rawHeaders: string[]): HeaderList {
    const list: HeaderList = [];
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
        list.push([rawHeaders[i], rawHeaders[i + 1]]);
    }
    return list;
}

export function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let failed = false;
        let ended = false;

        req.on('data', (chunk: Buffer) => {
            if (failed) return;
            size += chunk.length;
            if (size > limit) {
                failed = true;
                reject(new PayloadTooLargeError(limit));
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            ended = true;
            if (!failed) resolve(Buffer.concat(chunks));
        });
        req.on('error', (err) => {
            if (failed) return;
            failed = true;
            reject(err);
        });
        req.on('close', () => {
            if (ended || failed) return;
            failed = true;
            reject(new ClientAbortError());
        });
    });
}

/**
 * The listener: accepts client connections, turns each request into an
 * InboundRequest for the engine, and writes the engine's answer back.
 */
export class ProxyManager {
    public router: Router;
    public tracker: Tracker;
    public cache: CacheStore;
    public engine: ProxyEngine;

    private connections: ConnectionManager;
    private httpServer: http.Server;
    private apiServer?: APIServer;

    constructor(private readonly options: ProxyManagerOptions) {
        const now = options.routeOptions?.now;
        this.router = new Router(options.routeOptions);
        this.tracker = new Tracker(now);
        this.cache = new CacheStore({
            maxEntries: options.cache.maxEntries,
            maxBytes: options.cache.maxBytes,
            now
        });
        this.connections = new ConnectionManager(options.transport ?? new HttpTransport());
        this.engine = new ProxyEngine({
            cache: this.cache,
            connections: this.connections,
            tracker: this.tracker,
            maxBackgroundRefreshes: options.maxBackgroundRefreshes,
            now
        });

        // Initialize API
        if (options.apiPort !== undefined) {
            this.apiServer = new APIServer(this.router, this.tracker, this.cache, options.apiPort);
        }

        // Initialize HTTP Server
        this.httpServer = http.createServer((req, res) => {
            this.handleRequest(req, res).catch((err: unknown) => {
                logger.error({ err: errorMessage(err) }, 'Unhandled listener error');
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({ error: 'Internal Server Error', code: 'INTERNAL_ERROR' }));
                } else {
                    res.destroy();
                }
            });
        });
    }

    /**
     * Entry point for all incoming HTTP traffic.
     */
    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const hostHeader = req.headers.host;

        // Basic Host validation
        if (!hostHeader) {
            this.writeError(res, 400, 'MISSING_HOST');
            return;
        }

        // 1. Resolve Route
        const hostname = hostHeader.replace(/:\d+$/, ''); // Strip port if present
        const route = this.router.resolve(hostname);

        if (!route) {
            this.writeError(res, 404, 'NO_ROUTE');
            return;
        }

        // 2. Client disconnects abort the engine
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        let body: Buffer;
        try {
            body = await readBody(req, this.options.maxBodyBytes);
        } catch (err) {
            if (err instanceof PayloadTooLargeError) {
                this.writeError(res, 413, err.code, { Connection: 'close' });
                return;
            }
            logger.warn({ err: errorMessage(err) }, 'Failed reading request body');
            res.destroy();
            return;
        }

        const { path, query } = splitUrl(req.url ?? '/');
        const request: InboundRequest = {
            method: req.method ?? 'GET',
            scheme: 'http',
            host: hostHeader,
            path,
            query,
            headers: toHeaderList(req.rawHeaders),
            body,
            clientAddress: req.socket.remoteAddress ?? 'unknown',
            receivedAt: Date.now()
        };

        // 3. Dispatch
        const response = await this.engine.handle(route, request, controller.signal);
        if (!response) {
            if (!res.destroyed) res.destroy();
            return;
        }

        this.writeResponse(res, request.method, response);
    }

    private writeResponse(res: http.ServerResponse, method: string, response: OutboundResponse): void {
        if (res.destroyed) return;

        const noBody = method.toUpperCase() === 'HEAD'
            || response.status === 204
            || response.status === 304
            || response.status < 200;
        const flat: string[] = [];
        for (const [name, value] of response.headers) {
            // Body is fully buffered; length is recomputed below
            if (!noBody && name.toLowerCase() === 'content-length') continue;
            flat.push(name, value);
        }
        if (!noBody) {
            flat.push('Content-Length', String(response.body.length));
        }

        res.writeHead(response.status, flat);
        res.end(noBody ? undefined : response.body);
    }

    private writeError(res: http.ServerResponse, status: number, code: string, extra: Record<string, string> = {}): void {
        const body = JSON.stringify({ error: http.STATUS_CODES[status] ?? 'Error', code });
        res.writeHead(status, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body), ...extra });
        res.end(body);
    }

    public async start(): Promise<void> {
        await new Promise<void>((resolve, reject) => {
            this.httpServer.once('error', reject);
            this.httpServer.listen(this.options.port, () => {
                this.httpServer.off('error', reject);
                resolve();
            });
        });
        logger.info(`HTTP Proxy listening on port ${this.port()}`);

        this.cache.startSweep(this.options.cache.sweepIntervalMs);

        if (this.apiServer) {
            await this.apiServer.start();
        }
    }

    /** Bound port; differs from the configured one when that was 0. */
    public port(): number {
        const address = this.httpServer.address();
        return address && typeof address === 'object' ? address.port : this.options.port;
    }

    public async stop(): Promise<void> {
        const closures: Promise<unknown>[] = [
            new Promise(resolve => {
                this.httpServer.close(resolve);
                this.httpServer.closeAllConnections();
            })
        ];
        if (this.apiServer) {
            closures.push(this.apiServer.stop());
        }

        this.router.stop();
        this.cache.stopSweep();
        await Promise.all(closures);
        await this.engine.close();
        this.connections.destroy();
    }
}
