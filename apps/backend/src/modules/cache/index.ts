// Types
export type { CacheProvider } from './provider.interface';
export * from './types';

// Storage + providers
export { MemoryKVStore, type MemoryPutOptions } from './memory-store';
export { createMemoryCacheProvider } from './memory-provider';

// Cache Strategies
export {
  CACHE_STRATEGIES,
  getCacheKey,
  getStrategy,
  getTTLForResource
} from './cache-strategies';

// Generic Cache Manager
export {
  cacheGet,
  cacheSet,
  isStale,
  withDeduplication,
  type CacheEnv
} from './cache-manager';
