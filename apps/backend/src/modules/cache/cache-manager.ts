import { logCacheOperation } from '../../utils/metrics';
import { getCacheKey, getStrategy, getTTLForResource } from './cache-strategies';
import { createMemoryCacheProvider } from './memory-provider';
import type { MemoryKVStore } from './memory-store';
import type { CacheConfig, CacheMeta, CacheResult, ResourceType } from './types';

/**
 * In-flight request tracking for deduplication
 */
const inFlightRequests = new Map<string, Promise<unknown>>();

export interface CacheEnv {
  CACHE_STORE: MemoryKVStore;
  /** Overrides the per-resource TTL when set */
  CACHE_TTL_SECONDS?: number;
}

// =============================================================================
// GENERIC CACHE OPERATIONS
// =============================================================================

/**
 * Generic cache get operation
 */
export const cacheGet = async <T>(
  env: CacheEnv,
  resourceType: ResourceType,
  params: Record<string, string>
): Promise<CacheResult<T>> => {
  const cacheKey = getCacheKey(resourceType, params);
  const startTime = performance.now();

  console.log(`🔍 [Cache] Checking cache for key: ${cacheKey} (type: ${resourceType})`);

  const cache = createMemoryCacheProvider<T>(env.CACHE_STORE);
  const result = await cache.get(cacheKey);
  const durationMs = performance.now() - startTime;

  if (result.data !== null) {
    // Stale entries count as misses; the caller refreshes them upstream
    logCacheOperation('get', cacheKey, !isStale(result.meta), durationMs);
    return {
      data: result.data,
      source: 'memory',
      meta: result.meta ?? undefined,
    };
  }

  logCacheOperation('get', cacheKey, false, durationMs);
  return { data: null, source: 'none' };
};

/**
 * Generic cache set operation
 */
export const cacheSet = async <T>(
  env: CacheEnv,
  resourceType: ResourceType,
  params: Record<string, string>,
  data: T
): Promise<boolean> => {
  const strategy = getStrategy(resourceType);
  const cacheKey = getCacheKey(resourceType, params);
  const ttl = getTTLForResource(resourceType, env.CACHE_TTL_SECONDS);
  const config: CacheConfig = { ttl, swr: strategy.swr };

  console.log(`💾 [Cache] Storing key: ${cacheKey} (TTL: ${ttl}s)`);

  const cache = createMemoryCacheProvider<T>(env.CACHE_STORE);
  const success = await cache.set(cacheKey, data, config);
  logCacheOperation('set', cacheKey, success);

  return success;
};

// =============================================================================
// REQUEST DEDUPLICATION
// =============================================================================

/**
 * Request deduplication wrapper
 * Prevents duplicate API calls for the same cache key
 */
export const withDeduplication = async <T>(
  cacheKey: string,
  fetchFn: () => Promise<T>
): Promise<T> => {
  const existing = inFlightRequests.get(cacheKey) as Promise<T> | undefined;
  if (existing) {
    console.log(`🔄 [Dedup] Reusing in-flight request for ${cacheKey}`);
    return existing;
  }

  const promise = fetchFn().finally(() => {
    inFlightRequests.delete(cacheKey);
  });

  inFlightRequests.set(cacheKey, promise);
  console.log(`🚀 [Dedup] New request for ${cacheKey}`);

  return promise;
};

// =============================================================================
// STALENESS CHECK
// =============================================================================

/**
 * Check if cache data is stale based on the TTL it was stored with
 */
export const isStale = (meta: CacheMeta | undefined | null): boolean => {
  if (!meta) return true;

  const updatedAt = new Date(meta.updatedAt).getTime();
  const age = (Date.now() - updatedAt) / 1000;

  return age > meta.ttl;
};
