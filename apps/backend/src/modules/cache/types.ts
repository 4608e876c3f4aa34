export interface CacheConfig {
  ttl: number;
  swr?: number;
}

export interface CacheMeta {
  updatedAt: string;
  ttl: number;
}

export interface CacheResult<T> {
  data: T | null;
  source: 'memory' | 'none';
  meta?: CacheMeta;
}

export const TTL = {
  STANDARD: 3600, // 1 hour; Quandl datasets refresh at most a few times a day
} as const;

export const SWR = {
  STANDARD: 7200, // keep entries 2h past TTL as a fallback when Quandl is down
} as const;

// Resource types for generic caching (one per pack function)
export type ResourceType =
  | 'quandl-series'
  | 'quandl-table'
  | 'quandl-list';

export interface CacheStrategyConfig {
  resourceType: ResourceType;
  ttl: number;
  swr: number;
  keyGenerator: (params: Record<string, string>) => string;
}
