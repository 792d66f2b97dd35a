import fs from 'fs';
import { z } from 'zod';

import { ConfigError, errorMessage } from '../core/errors';
import { Routes } from '../types/models';
import { parseRoutes, ProcessConfigSchema } from './schema';

export { parseRouteConfig, parseRoutes, RouteConfigSchema } from './schema';

export interface ProcessConfig {
    port: number;
    apiPort: number;
    routesFile: string;
    cache: {
        maxEntries: number;
        maxBytes: number;
        sweepIntervalMs: number;
    };
    maxBodyBytes: number;
    maxBackgroundRefreshes: number;
}

export function formatZodError(error: z.ZodError): string {
    return error.errors
        .map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
        .join('; ');
}

/**
 * Reads process settings from the environment. Unset variables take their
 * defaults; malformed ones fail startup.
 */
export function loadProcessConfig(env: NodeJS.ProcessEnv = process.env): ProcessConfig {
    const result = ProcessConfigSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(`Invalid environment: ${formatZodError(result.error)}`);
    }

    const e = result.data;
    return {
        port: e.PORT,
        apiPort: e.API_PORT,
        routesFile: e.ROUTES_FILE,
        cache: {
            maxEntries: e.CACHE_MAX_ENTRIES,
            maxBytes: e.CACHE_MAX_BYTES,
            sweepIntervalMs: e.CACHE_SWEEP_INTERVAL_MS
        },
        maxBodyBytes: e.MAX_BODY_BYTES,
        maxBackgroundRefreshes: e.MAX_BACKGROUND_REFRESHES
    };
}

export function loadRoutes(file: string): Routes {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
        throw new ConfigError(`Cannot read routes from ${file}: ${errorMessage(err)}`);
    }

    try {
        return parseRoutes(raw);
    } catch (err) {
        if (err instanceof z.ZodError) {
            throw new ConfigError(`Invalid routes in ${file}: ${formatZodError(err)}`);
        }
        throw err;
    }
}
