import { loadProcessConfig, loadRoutes } from './config';
import { errorMessage } from './core/errors';
import { StateChange } from './core/HealthChecker';
import { ProxyManager } from './core/ProxyManager';
import { createLogger } from './utils/logger';

// PORT=8080 API_PORT=8081 ROUTES_FILE=./routes.json npm start

const logger = createLogger('main');

async function main(): Promise<void> {
    const config = loadProcessConfig();
    const routes = loadRoutes(config.routesFile);

    const proxy = new ProxyManager({
        port: config.port,
        apiPort: config.apiPort,
        maxBodyBytes: config.maxBodyBytes,
        cache: config.cache,
        maxBackgroundRefreshes: config.maxBackgroundRefreshes
    });

    routes.routes.forEach((route) => {
        const added = proxy.router.addRoute(route);
        added.on('upstream-state', (change: StateChange) => logger.info(change, 'Upstream state changed'));
    });

    await proxy.start();
    logger.info({ port: proxy.port(), routes: routes.routes.length }, 'Proxy started');

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        proxy.stop().then(
            () => process.exit(0),
            (err: unknown) => {
                logger.error({ err: errorMessage(err) }, 'Shutdown failed');
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    logger.fatal({ err: errorMessage(err) }, 'Failed to start proxy');
    process.exit(1);
});
