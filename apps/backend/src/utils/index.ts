export {
  getMetrics, logApiCall, logCacheOperation, logEvent, logRequest, recordCacheHit,
  recordCacheMiss, recordFunctionCall, recordResponseTime, resetMetrics,
  type MetricsSnapshot
} from './metrics';
export {
  createQuotaManager, QuotaExceededError, QuotaManager,
  type QuotaConfig, type QuotaState, type RecordCallResult
} from './quota-manager';
