import { Clock, HeaderList } from '../../types/models';
import { createLogger } from '../../utils/logger';
import { CacheStoreError } from '../errors';
import { globToRegExp } from './CachePolicy';

const logger = createLogger('CacheStore');

export interface CacheEntry {
    key: string;
    status: number;
    headers: HeaderList;
    body: Buffer;
    createdAt: number;
    ttlSeconds: number;
    /** How long past its TTL the entry may still be served while it is refreshed. */
    staleSeconds: number;
    size: number;
}

export type CacheEntryState = 'fresh' | 'stale' | 'updating';

export interface CacheLookup {
    entry: CacheEntry;
    state: CacheEntryState;
}

export type CacheEntryInput = Pick<CacheEntry, 'status' | 'headers' | 'body' | 'ttlSeconds' | 'staleSeconds'>;

export interface CacheStoreOptions {
    maxEntries: number;
    maxBytes: number;
    now?: Clock;
}

export interface CacheStats {
    entries: number;
    bytes: number;
    maxEntries: number;
    maxBytes: number;
    hits: number;
    staleHits: number;
    misses: number;
    evictions: number;
    expired: number;
}

/**
 * In-memory response cache with TTL, a stale-while-revalidate window and LRU
 * eviction bounded by entry count and total bytes.
 *
 * Map insertion order doubles as recency order: a hit re-inserts the key at
 * the end, eviction takes from the front.
 */
export class CacheStore {
    private entries = new Map<string, CacheEntry>();
    private updating = new Set<string>();
    private totalBytes = 0;
    private readonly now: Clock;

    private hits = 0;
    private staleHits = 0;
    private misses = 0;
    private evictions = 0;
    private expired = 0;

    private sweepInterval: NodeJS.Timeout | null = null;

    constructor(private readonly options: CacheStoreOptions) {
        this.now = options.now ?? Date.now;
    }

    get(key: string): CacheLookup | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            this.misses++;
            return undefined;
        }

        const age = this.now() - entry.createdAt;
        if (age >= (entry.ttlSeconds + entry.staleSeconds) * 1000) {
            this.remove(key);
            this.expired++;
            this.misses++;
            return undefined;
        }

        this.touch(key, entry);

        if (age < entry.ttlSeconds * 1000) {
            this.hits++;
            return { entry, state: 'fresh' };
        }

        this.staleHits++;
        return { entry, state: this.updating.has(key) ? 'updating' : 'stale' };
    }

    /**
     * Stores (or replaces) an entry, evicting least recently used entries
     * until both bounds hold. Throws CacheStoreError when the entry alone
     * exceeds the byte bound.
     */
    put(key: string, input: CacheEntryInput): CacheEntry {
        const size = entrySize(key, input.headers, input.body);
        if (size > this.options.maxBytes) {
            throw new CacheStoreError(`Entry of ${size} bytes exceeds the cache size of ${this.options.maxBytes} bytes`);
        }

        this.remove(key);

        const entry: CacheEntry = { key, ...input, createdAt: this.now(), size };
        this.entries.set(key, entry);
        this.totalBytes += size;

        this.evict();
        return entry;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    /**
     * Removes one key, or every key matching a RegExp or a glob ("*" wildcard).
     * Returns the number of entries removed.
     */
    purge(target: string | RegExp): number {
        if (typeof target === 'string' && !target.includes('*')) {
            return this.remove(target) ? 1 : 0;
        }

        const pattern = typeof target === 'string' ? globToRegExp(target) : target;
        let removed = 0;
        for (const key of Array.from(this.entries.keys())) {
            if (pattern.test(key) && this.remove(key)) removed++;
        }
        logger.info({ pattern: pattern.source, removed }, 'Cache purged');
        return removed;
    }

    /** Marks a key as being refreshed in the background (reported as `updating`). */
    setUpdating(key: string, updating: boolean): void {
        if (updating) this.updating.add(key);
        else this.updating.delete(key);
    }

    /** Drops every entry past its stale window. */
    sweep(): number {
        const now = this.now();
        let removed = 0;
        for (const [key, entry] of Array.from(this.entries.entries())) {
            if (now - entry.createdAt >= (entry.ttlSeconds + entry.staleSeconds) * 1000) {
                this.remove(key);
                removed++;
            }
        }
        this.expired += removed;

        if (removed > 0) {
            logger.debug(`Swept ${removed} expired cache entries`);
        }
        return removed;
    }

    startSweep(intervalMs: number): void {
        if (this.sweepInterval || intervalMs <= 0) return;
        this.sweepInterval = setInterval(() => this.sweep(), intervalMs).unref();
    }

    stopSweep(): void {
        if (this.sweepInterval) {
            clearInterval(this.sweepInterval);
            this.sweepInterval = null;
        }
    }

    stats(): CacheStats {
        return {
            entries: this.entries.size,
            bytes: this.totalBytes,
            maxEntries: this.options.maxEntries,
            maxBytes: this.options.maxBytes,
            hits: this.hits,
            staleHits: this.staleHits,
            misses: this.misses,
            evictions: this.evictions,
            expired: this.expired
        };
    }

    private touch(key: string, entry: CacheEntry): void {
        this.entries.delete(key);
        this.entries.set(key, entry);
    }

    private remove(key: string): boolean {
        const entry = this.entries.get(key);
        if (!entry) return false;
        this.entries.delete(key);
        this.totalBytes -= entry.size;
        return true;
    }

    private evict(): void {
        while (this.entries.size > this.options.maxEntries || this.totalBytes > this.options.maxBytes) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.remove(oldest.value);
            this.evictions++;
        }
    }
}

function entrySize(key: string, headers: HeaderList, body: Buffer): number {
    let size = Buffer.byteLength(key) + body.length;
    for (const [name, value] of headers) {
        size += Buffer.byteLength(name) + Buffer.byteLength(value);
    }
    return size;
}
