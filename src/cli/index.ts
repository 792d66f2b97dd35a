#!/usr/bin/env node
import { Command } from 'commander';

const program = new Command();
const API_URL = process.env.PROXY_API_URL || 'http://localhost:8081/api/v1';

program
    .name('proxy-cli')
    .description('CLI to manage the caching reverse proxy')
    .version('1.0.0');

// Upstreams Command
program
    .command('upstreams [vHost]')
    .description('Show upstream health and active connections')
    .action(async (vHost?: string) => {
        try {
            const url = vHost ? `${API_URL}/upstreams/${encodeURIComponent(vHost)}` : `${API_URL}/upstreams`;
            const res = await fetch(url);
            const data: unknown = await res.json();
            if (!res.ok) {
                console.error('Failed to fetch upstreams:', data);
                return;
            }
            if (vHost) {
                console.table(data);
            } else {
                console.log(JSON.stringify(data, null, 2));
            }
        } catch (err) {
            console.error('Failed to fetch upstreams:', err);
        }
    });

// Routes Commands
const routes = program.command('routes').description('Manage virtual host routes');

routes
    .command('list')
    .description('List all configured routes')
    .action(async () => {
        try {
            const res = await fetch(`${API_URL}/routes`);
            const data: unknown = await res.json();
            console.log(JSON.stringify(data, null, 2));
        } catch (err) {
            console.error('Failed to fetch routes:', err);
        }
    });

routes
    .command('remove <vHost>')
    .description('Remove a virtual host route')
    .action(async (vHost: string) => {
        try {
            const res = await fetch(`${API_URL}/routes/${encodeURIComponent(vHost)}`, {
                method: 'DELETE'
            });

            if (res.ok) {
                console.log(`Successfully removed route for ${vHost}`);
            } else {
                console.error('Failed to remove route');
            }
        } catch (err) {
            console.error('Error removing route:', err);
        }
    });

// Stats Command
program
    .command('stats [vHost]')
    .description('View real-time metrics')
    .action(async (vHost?: string) => {
        try {
            const url = vHost ? `${API_URL}/stats/${encodeURIComponent(vHost)}` : `${API_URL}/stats`;
            const res = await fetch(url);
            const data: unknown = await res.json();
            if (vHost) {
                console.table([data]);
            } else {
                console.table(data);
            }
        } catch (err) {
            console.error('Failed to fetch stats:', err);
        }
    });

// Cache Commands
const cache = program.command('cache').description('Inspect and purge the response cache');

cache
    .command('stats')
    .description('Show cache occupancy and hit counters')
    .action(async () => {
        try {
            const res = await fetch(`${API_URL}/cache`);
            const data: unknown = await res.json();
            console.table([data]);
        } catch (err) {
            console.error('Failed to fetch cache stats:', err);
        }
    });

cache
    .command('purge <pattern>')
    .description('Purge entries by exact key or glob pattern (e.g. "GET http://example.com/static/*")')
    .action(async (pattern: string) => {
        try {
            const param = pattern.includes('*') ? 'pattern' : 'key';
            const res = await fetch(`${API_URL}/cache?${param}=${encodeURIComponent(pattern)}`, {
                method: 'DELETE'
            });
            const data: unknown = await res.json();

            if (res.ok) {
                console.log('Purged:', data);
            } else {
                console.error('Failed to purge cache:', data);
            }
        } catch (err) {
            console.error('Error purging cache:', err);
        }
    });

program.parse(process.argv);
