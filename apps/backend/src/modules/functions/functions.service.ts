import type { FunctionReference, Grid } from '@quandl-sheets/shared-types';
import { recordCacheHit, recordFunctionCall } from '../../utils/metrics';
import type { QuotaManager } from '../../utils/quota-manager';
import {
  type CacheEnv,
  cacheGet,
  cacheSet,
  getCacheKey,
  isStale,
  withDeduplication,
} from '../cache';
import { FunctionNotFoundError } from './errors';
import { parseFormula } from './formula';
import { getFunction } from './registry';

export interface FunctionsEnv extends CacheEnv {
  QUANDL_API_URL: string;
  QUANDL_API_KEY?: string;
  QUOTA: QuotaManager;
}

export type FunctionSource = 'API' | 'Memory Cache' | 'Stale Cache' | 'No API Key';

export interface FunctionServiceResult {
  data: Grid;
  source: FunctionSource;
}

/**
 * Shown in the sheet when no API key is configured
 */
export const EMPTY_GRID: Grid = [['']];

export const functionsService = {
  /**
   * Run a pack function with positional arguments
   * Caching strategy:
   * - fresh cache entry is returned as is
   * - identical concurrent calls share one upstream fetch
   * - stale entry is served when the upstream fetch fails
   */
  async invoke({
    reference,
    args,
    env,
  }: {
    reference: FunctionReference;
    args: readonly unknown[];
    env: FunctionsEnv;
  }): Promise<FunctionServiceResult> {
    const definition = getFunction(reference);
    if (!definition) {
      throw new FunctionNotFoundError(reference.name);
    }

    const { name } = definition.manifest;
    recordFunctionCall(name);

    // Validate arguments even when no key is configured
    const call = definition.prepare(args);

    const apiKey = env.QUANDL_API_KEY;
    if (!apiKey) {
      console.warn(`⚠️ [Functions] ${name}: no API key configured, returning empty grid`);
      return { data: EMPTY_GRID, source: 'No API Key' };
    }

    const { resourceType } = definition;
    const params = call.cacheParams;
    const dedupKey = getCacheKey(resourceType, params);

    return withDeduplication(dedupKey, async (): Promise<FunctionServiceResult> => {
      // 1. Check cache
      const cacheResult = await cacheGet<Grid>(env, resourceType, params);
      let staleData: Grid | null = null;

      if (cacheResult.data && cacheResult.source !== 'none') {
        if (!isStale(cacheResult.meta)) {
          console.log(`✅ [Functions] Cache hit for ${dedupKey}`);
          return { data: cacheResult.data, source: 'Memory Cache' };
        }

        staleData = cacheResult.data;
        console.log(`⏳ [Functions] Cache data is stale for ${dedupKey}`);
      }

      // 2. Run against the API
      console.log(`🌐 [Functions] Running ${name} against the API`);
      try {
        const data = await call.execute({
          apiUrl: env.QUANDL_API_URL,
          apiKey,
          quota: env.QUOTA,
        });

        const cached = await cacheSet(env, resourceType, params, data);
        if (!cached) {
          console.error(`❌ [Functions] Failed to cache ${dedupKey}`);
        }

        return { data, source: 'API' };
      } catch (error) {
        console.error(`❌ [Functions] ${name} failed:`, error);

        if (staleData) {
          console.log(`⚠️ [Functions] Using stale data as fallback`);
          recordCacheHit('stale');
          return { data: staleData, source: 'Stale Cache' };
        }

        throw error;
      }
    });
  },

  /**
   * Parse and run `=FLEX("<org>/<function>", ...)`
   */
  async evaluateFormula({
    formula,
    env,
  }: {
    formula: string;
    env: FunctionsEnv;
  }): Promise<FunctionServiceResult> {
    const { reference, args } = parseFormula(formula);
    return functionsService.invoke({ reference, args, env });
  },
};
