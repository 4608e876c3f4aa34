import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getMetrics, resetMetrics } from '../../utils/metrics';
import { QuotaExceededError, QuotaManager } from '../../utils/quota-manager';
import { getCacheKey, MemoryKVStore } from '../cache';
import { FunctionArgumentError, FunctionNotFoundError, FormulaSyntaxError } from './errors';
import { EMPTY_GRID, type FunctionsEnv, functionsService } from './functions.service';

const jsonResponse = (body: unknown, status = 200, statusText = 'OK'): Response =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });

const listResponse = () =>
  jsonResponse({
    dataset: {
      column_names: ['Date', 'Nominal Price'],
      data: [['2019-09-30', 0.53]],
    },
  });

const LIST_GRID = [
  ['date', 'nominal price'],
  ['2019-09-30', 0.53],
];

const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

const createEnv = (overrides: Partial<FunctionsEnv> = {}): FunctionsEnv => ({
  CACHE_STORE: new MemoryKVStore(),
  QUANDL_API_URL: 'https://data.test/api/v3',
  QUANDL_API_KEY: 'test-key',
  QUOTA: new QuotaManager(),
  ...overrides,
});

describe('functionsService', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    resetMetrics();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('invoke', () => {
    it('should return an empty grid without calling the API when no key is set', async () => {
      const result = await functionsService.invoke({
        reference: { owner: 'acme', name: 'quandl-series' },
        args: ['NASDAQOMX/XNDXT25'],
        env: createEnv({ QUANDL_API_KEY: undefined }),
      });

      expect(result).toEqual({ data: EMPTY_GRID, source: 'No API Key' });
      expect(result.data).toEqual([['']]);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should still validate arguments when no key is set', async () => {
      await expect(
        functionsService.invoke({
          reference: { name: 'quandl-series' },
          args: [],
          env: createEnv({ QUANDL_API_KEY: undefined }),
        }),
      ).rejects.toBeInstanceOf(FunctionArgumentError);
    });

    it('should reject unknown functions', async () => {
      await expect(
        functionsService.invoke({ reference: { name: 'quandl-nope' }, args: [], env: createEnv() }),
      ).rejects.toBeInstanceOf(FunctionNotFoundError);
    });

    it('should serve the second identical call from the cache', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(listResponse()));
      const env = createEnv();

      const first = await functionsService.invoke({
        reference: { name: 'quandl-list' },
        args: ['HKEX/83079', 'date, nominal price'],
        env,
      });
      const second = await functionsService.invoke({
        reference: { owner: 'acme', name: 'quandl-list' },
        args: ['HKEX/83079', 'Date,Nominal Price'],
        env,
      });

      expect(first).toEqual({ data: LIST_GRID, source: 'API' });
      expect(second).toEqual({ data: LIST_GRID, source: 'Memory Cache' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(getMetrics().functions).toEqual({ 'quandl-list': 2 });
    });

    it('should share one upstream request between concurrent identical calls', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(listResponse()));
      const env = createEnv();
      const call = () =>
        functionsService.invoke({ reference: { name: 'quandl-list' }, args: ['HKEX/83079'], env });

      const [first, second] = await Promise.all([call(), call()]);

      expect(first).toEqual(second);
      expect(first.source).toBe('API');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should serve stale data when the refresh fails', async () => {
      const env = createEnv();
      const cacheKey = getCacheKey('quandl-list', { name: 'HKEX/83079', properties: '*' });
      await env.CACHE_STORE.put(cacheKey, JSON.stringify(LIST_GRID), {
        expirationTtl: 7200,
        metadata: {
          updatedAt: new Date(Date.now() - 2 * 3600 * 1000).toISOString(),
          ttl: 3600,
        },
      });
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 500, 'Internal Server Error'));

      const result = await functionsService.invoke({
        reference: { name: 'quandl-list' },
        args: ['HKEX/83079'],
        env,
      });

      expect(result).toEqual({ data: LIST_GRID, source: 'Stale Cache' });
      expect(getMetrics().cache.staleServed).toBe(1);
    });

    it('should surface the failure when there is no stale data', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}, 500, 'Internal Server Error'));

      await expect(
        functionsService.invoke({ reference: { name: 'quandl-list' }, args: ['HKEX/83079'], env: createEnv() }),
      ).rejects.toThrow('API request failed: 500 Internal Server Error - {}');
    });

    it('should raise QuotaExceededError once the quota is spent', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(listResponse()));
      const env = createEnv({ QUOTA: new QuotaManager({ dailyLimit: 1, hourlyLimit: 1 }) });

      await functionsService.invoke({ reference: { name: 'quandl-list' }, args: ['HKEX/83079'], env });

      await expect(
        functionsService.invoke({ reference: { name: 'quandl-list' }, args: ['HKEX/83080'], env }),
      ).rejects.toBeInstanceOf(QuotaExceededError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('evaluateFormula', () => {
    it('should parse the formula and invoke the function', async () => {
      fetchMock.mockImplementation(() => Promise.resolve(listResponse()));

      const result = await functionsService.evaluateFormula({
        formula: '=FLEX("acme/quandl-list", "HKEX/83079", {"date", "nominal price"})',
        env: createEnv(),
      });

      expect(result).toEqual({ data: LIST_GRID, source: 'API' });
    });

    it('should raise syntax errors before any request', async () => {
      await expect(
        functionsService.evaluateFormula({ formula: '=FLEX("acme/quandl-list"', env: createEnv() }),
      ).rejects.toBeInstanceOf(FormulaSyntaxError);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
