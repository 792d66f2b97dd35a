export { buildCacheKey, normalizeHost, normalizeQuery } from './CacheKey';
export { CacheLock } from './CacheLock';
export type { LockResult } from './CacheLock';
export { CachePolicy, globToRegExp } from './CachePolicy';
export type { BypassReason } from './CachePolicy';
export { CacheStore } from './CacheStore';
export type { CacheEntry, CacheEntryInput, CacheEntryState, CacheLookup, CacheStats, CacheStoreOptions } from './CacheStore';
