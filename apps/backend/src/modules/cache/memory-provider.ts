import type { MemoryKVStore } from './memory-store';
import type { CacheProvider } from './provider.interface';
import type { CacheConfig, CacheMeta } from './types';

/**
 * Memory cache provider
 *
 * Stores serialized grids with an expiration of TTL + SWR seconds, so an
 * entry outlives its freshness window and can still be served as stale
 * data when Quandl is unreachable.
 */
export const createMemoryCacheProvider = <T = unknown>(
  store: MemoryKVStore
): CacheProvider<T> => {

  const set = async (
    key: string,
    data: T,
    config: CacheConfig
  ): Promise<boolean> => {
    try {
      const jsonData = JSON.stringify(data);

      const metadata = {
        updatedAt: new Date().toISOString(),
        ttl: config.ttl,
      };

      await store.put(key, jsonData, {
        expirationTtl: config.ttl + (config.swr ?? 0),
        metadata,
      });

      console.log(`✅ [Memory] Stored ${key} with TTL ${config.ttl}s`);
      return true;
    } catch (error) {
      console.error(`❌ [Memory] Error storing ${key}:`, error);
      return false;
    }
  };

  const get = async (
    key: string
  ): Promise<{ data: T | null; meta: CacheMeta | null }> => {
    try {
      const result = await store.getWithMetadata(key);

      if (!result.value) {
        console.log(`❓ [Memory] Miss for ${key}`);
        return { data: null, meta: null };
      }

      const data = JSON.parse(result.value) as T;

      const storedMeta = result.metadata ?? {};
      const meta: CacheMeta = {
        updatedAt: typeof storedMeta.updatedAt === 'string'
          ? storedMeta.updatedAt
          : new Date().toISOString(),
        ttl: typeof storedMeta.ttl === 'number' ? storedMeta.ttl : 0,
      };

      console.log(`✅ [Memory] Hit for ${key}`);
      return { data, meta };
    } catch (error) {
      console.error(`❌ [Memory] Error retrieving ${key}:`, error);
      return { data: null, meta: null };
    }
  };

  return { set, get };
};
