import { z } from 'zod';
import { MemoryKVStore } from './modules/cache';
import type { FunctionsEnv } from './modules/functions';
import { createQuotaManager } from './utils/quota-manager';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

/**
 * Process environment, validated once at startup
 */
export const configSchema = z.object({
  QUANDL_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  QUANDL_API_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://www.quandl.com/api/v3'),
  ),
  PORT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(65535).default(8787),
  ),
  APPROVED_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
  CACHE_TTL_SECONDS: positiveInt(3600),
  CACHE_MAX_ENTRIES: positiveInt(1000),
  RATE_LIMIT_PER_MINUTE: positiveInt(60),
  QUOTA_DAILY_LIMIT: positiveInt(50000),
  QUOTA_HOURLY_LIMIT: positiveInt(5000),
  REQUEST_TIMEOUT_MS: positiveInt(30000),
});

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  code = 'INVALID_CONFIG';
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse environment variables; throws ConfigError listing every bad value
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
};

/**
 * Bindings handed to the Hono app on every request
 */
export interface AppEnv extends FunctionsEnv {
  APPROVED_ORIGINS?: string;
}

/**
 * Build the long-lived bindings (cache store, quota counters) for one process
 */
export const createEnv = (config: AppConfig): AppEnv => ({
  QUANDL_API_KEY: config.QUANDL_API_KEY,
  QUANDL_API_URL: config.QUANDL_API_URL,
  APPROVED_ORIGINS: config.APPROVED_ORIGINS,
  CACHE_TTL_SECONDS: config.CACHE_TTL_SECONDS,
  CACHE_STORE: new MemoryKVStore(config.CACHE_MAX_ENTRIES),
  QUOTA: createQuotaManager({
    dailyLimit: config.QUOTA_DAILY_LIMIT,
    hourlyLimit: config.QUOTA_HOURLY_LIMIT,
  }),
});
