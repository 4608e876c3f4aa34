export {
  cors,
  createCors,
  DEFAULT_ORIGINS,
  EXPOSED_HEADERS,
  parseOrigins,
  resolveAllowedOrigin,
} from './cors';
export {
  getClientIp,
  rateLimiter,
  type RateLimiterConfig,
  RateLimitStore,
} from './rate-limiter';
export { secureHeaders, type SecureHeadersConfig } from './secure-headers';
