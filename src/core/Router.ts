import { Route, RouteOptions } from './Route';
import { RouteConfig } from '../types/models';

export const DEFAULT_VHOST = '*';

export class Router {
    private routes: Map<string, Route> = new Map();

    constructor(private readonly routeOptions: RouteOptions = {}) { }

    /** Adds a route, replacing (and stopping) any route for the same vHost. */
    addRoute(config: RouteConfig): Route {
        const route = new Route(config, this.routeOptions);
        const vHost = config.vHost.toLowerCase();

        this.routes.get(vHost)?.stop();
        this.routes.set(vHost, route);
        return route;
    }

    removeRoute(vHost: string): boolean {
        const key = vHost.toLowerCase();
        const route = this.routes.get(key);
        if (route) {
            route.stop();
            return this.routes.delete(key);
        }
        return false;
    }

    stop(): void {
        for (const route of this.routes.values()) {
            route.stop();
        }
    }

    /** Exact host match first, then the default route when one is configured. */
    resolve(hostname: string): Route | undefined {
        return this.routes.get(hostname.toLowerCase()) ?? this.routes.get(DEFAULT_VHOST);
    }

    getRoute(vHost: string): Route | undefined {
        return this.routes.get(vHost.toLowerCase());
    }

    getRoutes(): Route[] {
        return Array.from(this.routes.values());
    }
}
