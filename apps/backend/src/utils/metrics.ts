/**
 * Metrics and Logging Utilities
 *
 * In-process counters for the function pack plus the structured log helpers
 * every module writes through. Counters reset on process restart.
 */

type LogLevel = 'info' | 'warn' | 'error';

/**
 * Upper bounds (exclusive) of the response time buckets, last one open-ended
 */
const RESPONSE_TIME_BUCKETS = [
  { label: '<10ms', below: 10 },
  { label: '<50ms', below: 50 },
  { label: '<100ms', below: 100 },
  { label: '<500ms', below: 500 },
  { label: '>500ms', below: Number.POSITIVE_INFINITY },
] as const;

type BucketLabel = (typeof RESPONSE_TIME_BUCKETS)[number]['label'];

interface MetricsState {
  cache: { hits: number; misses: number; staleServed: number };
  upstream: { calls: number; failures: number; totalDurationMs: number };
  responseTimes: Record<BucketLabel, number>;
  functionCalls: Record<string, number>;
  requests: { total: number; errors: number };
  startTime: number;
}

export interface MetricsSnapshot {
  cache: MetricsState['cache'] & { hitRate: string };
  upstream: { calls: number; failures: number; averageMs: number };
  responseTimes: Record<BucketLabel, number> & { p50Bucket: BucketLabel | 'N/A' };
  functions: Record<string, number>;
  requests: { total: number; errors: number; errorRate: string };
  uptime: number;
}

const emptyBuckets = (): Record<BucketLabel, number> => ({
  '<10ms': 0,
  '<50ms': 0,
  '<100ms': 0,
  '<500ms': 0,
  '>500ms': 0,
});

const createInitialState = (): MetricsState => ({
  cache: { hits: 0, misses: 0, staleServed: 0 },
  upstream: { calls: 0, failures: 0, totalDurationMs: 0 },
  responseTimes: emptyBuckets(),
  functionCalls: {},
  requests: { total: 0, errors: 0 },
  startTime: Date.now(),
});

let state: MetricsState = createInitialState();

const percent = (part: number, whole: number): string =>
  `${((part / whole) * 100).toFixed(2)}%`;

/**
 * A cached grid was found; `stale` marks one served after a failed refresh
 */
export const recordCacheHit = (kind: 'fresh' | 'stale' = 'fresh'): void => {
  if (kind === 'stale') {
    state.cache.staleServed++;
    return;
  }
  state.cache.hits++;
};

export const recordCacheMiss = (): void => {
  state.cache.misses++;
};

export const recordFunctionCall = (name: string): void => {
  state.functionCalls[name] = (state.functionCalls[name] ?? 0) + 1;
};

export const recordResponseTime = (timeMs: number): void => {
  state.requests.total++;
  const bucket = RESPONSE_TIME_BUCKETS.find(({ below }) => timeMs < below);
  if (bucket) {
    state.responseTimes[bucket.label]++;
  }
};

const medianBucket = (): BucketLabel | 'N/A' => {
  if (state.requests.total === 0) return 'N/A';

  let seen = 0;
  for (const { label } of RESPONSE_TIME_BUCKETS) {
    seen += state.responseTimes[label];
    if (seen >= state.requests.total / 2) return label;
  }
  return 'N/A';
};

export const getMetrics = (): MetricsSnapshot => {
  const { cache, upstream, requests } = state;
  const lookups = cache.hits + cache.misses;

  return {
    cache: {
      ...cache,
      hitRate: lookups > 0 ? percent(cache.hits, lookups) : 'N/A',
    },
    upstream: {
      calls: upstream.calls,
      failures: upstream.failures,
      averageMs: upstream.calls > 0 ? Math.round(upstream.totalDurationMs / upstream.calls) : 0,
    },
    responseTimes: { ...state.responseTimes, p50Bucket: medianBucket() },
    functions: { ...state.functionCalls },
    requests: {
      ...requests,
      errorRate: requests.total > 0 ? percent(requests.errors, requests.total) : '0%',
    },
    uptime: Date.now() - state.startTime,
  };
};

export const resetMetrics = (): void => {
  state = createInitialState();
};

const LOG_PREFIX: Record<LogLevel, string> = {
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

/**
 * Log a structured event as one JSON line
 */
export const logEvent = (
  event: string,
  data: Record<string, unknown> = {},
  level: LogLevel = 'info'
): void => {
  const line = JSON.stringify({ timestamp: new Date().toISOString(), event, ...data });
  const prefix = `${LOG_PREFIX[level]} [${event}]`;

  if (level === 'error') {
    console.error(prefix, line);
  } else if (level === 'warn') {
    console.warn(prefix, line);
  } else {
    console.log(prefix, line);
  }
};

export const logCacheOperation = (
  operation: 'get' | 'set',
  key: string,
  hit: boolean,
  durationMs?: number
): void => {
  if (operation === 'get') {
    if (hit) {
      recordCacheHit();
    } else {
      recordCacheMiss();
    }
  }

  logEvent('cache_operation', { operation, key: key.slice(0, 80), hit, durationMs });
};

/**
 * One request to Quandl; `endpoint` must already have the api key redacted
 */
export const logApiCall = (
  endpoint: string,
  success: boolean,
  durationMs: number,
  error?: string
): void => {
  state.upstream.calls++;
  state.upstream.totalDurationMs += durationMs;
  if (!success) {
    state.upstream.failures++;
  }

  logEvent('api_call', { endpoint, success, durationMs, error }, success ? 'info' : 'error');
};

export const logRequest = (
  path: string,
  method: string,
  statusCode: number,
  durationMs: number,
  source?: string
): void => {
  recordResponseTime(durationMs);
  if (statusCode >= 500) {
    state.requests.errors++;
  }

  logEvent('request', { path, method, statusCode, durationMs, source }, statusCode >= 500 ? 'error' : 'info');
};
