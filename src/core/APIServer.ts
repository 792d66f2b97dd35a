import fastify, { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { parseRouteConfig } from '../config';
import { createLogger } from '../utils/logger';
import { CacheStore } from './cache';
import { ConfigError } from './errors';
import { Router } from './Router';
import { Tracker } from './Tracker';

const logger = createLogger('APIServer');

const VHostParams = z.object({ vHost: z.string().min(1) });

const PurgeQuery = z.object({
    key: z.string().min(1).optional(),
    pattern: z.string().min(1).optional()
}).refine(q => q.key !== undefined || q.pattern !== undefined, {
    message: 'Either key or pattern is required'
});

/**
 * Management API: upstream health/status for operators, route
 * administration, request statistics and cache purging.
 */
export class APIServer {
    public readonly app: FastifyInstance;

    constructor(
        private router: Router,
        private tracker: Tracker,
        private cache: CacheStore,
        private port: number = 8081
    ) {
        this.app = fastify({ logger: false });
        this.setupRoutes();
    }

    private setupRoutes() {
        // GET /api/v1/upstreams - Health and load of every upstream, per route
        this.app.get('/api/v1/upstreams', async () => {
            return this.router.getRoutes().map(r => ({
                vHost: r.vHost,
                strategy: r.pool.strategy,
                upstreams: r.status()
            }));
        });

        // GET /api/v1/upstreams/:vHost - Upstreams of one route
        this.app.get('/api/v1/upstreams/:vHost', async (request, reply) => {
            const { vHost } = VHostParams.parse(request.params);
            const route = this.router.getRoute(vHost);
            if (!route) {
                return reply.code(404).send({ error: 'Route not found' });
            }
            return route.status();
        });

        // GET /api/v1/routes - List all routes
        this.app.get('/api/v1/routes', async () => {
            return this.router.getRoutes().map(r => r.config);
        });

        // POST /api/v1/routes - Create/Replace a route
        this.app.post('/api/v1/routes', async (request, reply) => {
            const config = parseRouteConfig(request.body);
            this.router.addRoute(config);
            logger.info({ vHost: config.vHost, upstreams: config.pool.servers.length }, 'Route configured');
            return reply.code(201).send(config);
        });

        // GET /api/v1/routes/:vHost - Get route details
        this.app.get('/api/v1/routes/:vHost', async (request, reply) => {
            const { vHost } = VHostParams.parse(request.params);
            const route = this.router.getRoute(vHost);
            if (!route) {
                return reply.code(404).send({ error: 'Route not found' });
            }
            return route.config;
        });

        // DELETE /api/v1/routes/:vHost - Remove a route
        this.app.delete('/api/v1/routes/:vHost', async (request, reply) => {
            const { vHost } = VHostParams.parse(request.params);
            const route = this.router.getRoute(vHost);
            if (!route || !this.router.removeRoute(vHost)) {
                return reply.code(404).send({ error: 'Route not found' });
            }
            this.tracker.removeStats(route.vHost);
            return reply.code(204).send();
        });

        // GET /api/v1/stats - Global stats
        this.app.get('/api/v1/stats', async () => {
            const allStats = this.tracker.getAllStats();
            return Object.fromEntries(allStats);
        });

        // GET /api/v1/stats/:vHost - Specific stats
        this.app.get('/api/v1/stats/:vHost', async (request, reply) => {
            const { vHost } = VHostParams.parse(request.params);
            const stats = this.tracker.getRouteStats(vHost);
            if (!stats) {
                return reply.code(404).send({ error: 'Stats not found' });
            }
            return stats;
        });

        // GET /api/v1/cache - Cache occupancy and hit counters
        this.app.get('/api/v1/cache', async () => {
            return this.cache.stats();
        });

        // DELETE /api/v1/cache?key=...|pattern=... - Purge entries
        this.app.delete('/api/v1/cache', async (request) => {
            const query = PurgeQuery.parse(request.query);
            const purged = this.cache.purge(query.key ?? query.pattern ?? '');
            return { purged };
        });

        // Error handling for Zod and config errors
        this.app.setErrorHandler((error, request, reply) => {
            if (error instanceof z.ZodError) {
                reply.status(400).send({
                    error: 'Validation Error',
                    details: error.errors
                });
            } else if (error instanceof ConfigError) {
                reply.status(400).send({
                    error: 'Invalid Configuration',
                    message: error.message
                });
            } else {
                reply.send(error);
            }
        });
    }

    public async start() {
        try {
            await this.app.listen({ port: this.port, host: '0.0.0.0' });
            logger.info(`Management API listening on port ${this.port}`);
        } catch (err) {
            logger.error(err, 'Failed to start API server');
            throw err;
        }
    }

    public async stop() {
        await this.app.close();
    }
}
