import { type CacheStrategyConfig, type ResourceType, SWR, TTL } from './types';

/**
 * Stable key: resource type plus params sorted by name
 */
const buildKey = (resourceType: ResourceType, params: Record<string, string>): string => {
  const serialized = Object.keys(params)
    .sort()
    .map((paramKey) => `${paramKey}=${params[paramKey]}`)
    .join('&');
  return `${resourceType}:${serialized}`;
};

export const CACHE_STRATEGIES: Record<ResourceType, CacheStrategyConfig> = {
  'quandl-series': {
    resourceType: 'quandl-series',
    ttl: TTL.STANDARD,
    swr: SWR.STANDARD,
    keyGenerator: (params) => buildKey('quandl-series', params),
  },
  'quandl-table': {
    resourceType: 'quandl-table',
    ttl: TTL.STANDARD,
    swr: SWR.STANDARD,
    keyGenerator: (params) => buildKey('quandl-table', params),
  },
  'quandl-list': {
    resourceType: 'quandl-list',
    ttl: TTL.STANDARD,
    swr: SWR.STANDARD,
    keyGenerator: (params) => buildKey('quandl-list', params),
  },
};

/**
 * Generate cache key for a resource
 */
export const getCacheKey = (
  resourceType: ResourceType,
  params: Record<string, string>
): string => {
  const strategy = CACHE_STRATEGIES[resourceType];
  return strategy.keyGenerator(params);
};

/**
 * Get strategy config for a resource type
 */
export const getStrategy = (resourceType: ResourceType): CacheStrategyConfig => {
  return CACHE_STRATEGIES[resourceType];
};

/**
 * TTL for a resource, with an optional configured override
 */
export const getTTLForResource = (
  resourceType: ResourceType,
  override?: number
): number => {
  return override ?? CACHE_STRATEGIES[resourceType].ttl;
};
