import type { CacheConfig, CacheMeta } from './types';

/**
 * CacheProvider defines the contract for all cache implementations
 */
export interface CacheProvider<T = unknown> {
  set: (key: string, data: T, config: CacheConfig) => Promise<boolean>;
  get: (key: string) => Promise<{ data: T | null; meta: CacheMeta | null }>;
}
