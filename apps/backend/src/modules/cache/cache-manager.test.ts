import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getMetrics, resetMetrics } from '../../utils/metrics';
import { cacheGet, cacheSet, isStale, withDeduplication } from './cache-manager';
import { getCacheKey } from './cache-strategies';
import { MemoryKVStore } from './memory-store';

describe('getCacheKey', () => {
  it('should sort params so key order does not matter', () => {
    expect(getCacheKey('quandl-table', { name: 'SHARADAR/SF3', filter: 'ticker=AAPL' })).toBe(
      'quandl-table:filter=ticker=AAPL&name=SHARADAR/SF3',
    );
    expect(getCacheKey('quandl-table', { filter: 'ticker=AAPL', name: 'SHARADAR/SF3' })).toBe(
      'quandl-table:filter=ticker=AAPL&name=SHARADAR/SF3',
    );
  });
});

describe('cacheGet / cacheSet', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should miss on an empty store', async () => {
    const env = { CACHE_STORE: new MemoryKVStore() };

    const result = await cacheGet<string[][]>(env, 'quandl-list', { name: 'HKEX/83079' });

    expect(result).toEqual({ data: null, source: 'none' });
  });

  it('should round-trip data with metadata', async () => {
    const env = { CACHE_STORE: new MemoryKVStore(), CACHE_TTL_SECONDS: 120 };
    const grid = [['date', 'high'], ['2026-02-27', 10.5]];

    expect(await cacheSet(env, 'quandl-list', { name: 'HKEX/83079' }, grid)).toBe(true);
    const result = await cacheGet<typeof grid>(env, 'quandl-list', { name: 'HKEX/83079' });

    expect(result.source).toBe('memory');
    expect(result.data).toEqual(grid);
    expect(result.meta).toEqual({ updatedAt: '2026-03-01T12:00:00.000Z', ttl: 120 });
  });

  it('should keep entries past TTL for the stale window', async () => {
    const env = { CACHE_STORE: new MemoryKVStore(), CACHE_TTL_SECONDS: 60 };
    await cacheSet(env, 'quandl-series', { name: 'X' }, [['a']]);

    vi.advanceTimersByTime(61_000);
    const result = await cacheGet<string[][]>(env, 'quandl-series', { name: 'X' });

    expect(result.data).toEqual([['a']]);
    expect(isStale(result.meta)).toBe(true);
  });

  it('should count only fresh entries as hits', async () => {
    resetMetrics();
    const env = { CACHE_STORE: new MemoryKVStore(), CACHE_TTL_SECONDS: 60 };
    await cacheSet(env, 'quandl-series', { name: 'X' }, [['a']]);

    await cacheGet<string[][]>(env, 'quandl-series', { name: 'X' });
    vi.advanceTimersByTime(61_000);
    await cacheGet<string[][]>(env, 'quandl-series', { name: 'X' });

    expect(getMetrics().cache).toMatchObject({ hits: 1, misses: 1, hitRate: '50.00%' });
  });
});

describe('isStale', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should treat missing metadata as stale', () => {
    expect(isStale(undefined)).toBe(true);
    expect(isStale(null)).toBe(true);
  });

  it('should compare age against the stored TTL', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:01:00Z'));

    expect(isStale({ updatedAt: '2026-03-01T12:00:00Z', ttl: 60 })).toBe(false);
    expect(isStale({ updatedAt: '2026-03-01T12:00:00Z', ttl: 59 })).toBe(true);
  });
});

describe('withDeduplication', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should share one in-flight promise per key', async () => {
    let resolveFetch: (value: string) => void = () => {};
    const fetchFn = vi.fn(
      () => new Promise<string>((resolve) => {
        resolveFetch = resolve;
      }),
    );

    const first = withDeduplication('key', fetchFn);
    const second = withDeduplication('key', fetchFn);
    resolveFetch('done');

    await expect(first).resolves.toBe('done');
    await expect(second).resolves.toBe('done');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should start a new request after the previous one settles', async () => {
    const fetchFn = vi.fn(async () => 'value');

    await withDeduplication('key-2', fetchFn);
    await withDeduplication('key-2', fetchFn);

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });
});
