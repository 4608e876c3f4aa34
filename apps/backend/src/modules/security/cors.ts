import type { MiddlewareHandler } from 'hono';

/**
 * CORS configuration options
 */
interface CorsConfig {
  /**
   * Allowed origins; '*' allows any
   */
  origins?: string[];

  methods?: string[];

  allowedHeaders?: string[];

  /**
   * Exposed headers (visible to client)
   */
  exposedHeaders?: string[];

  /**
   * Preflight cache time in seconds
   */
  maxAge?: number;
}

/**
 * Local spreadsheet add-in dev servers
 */
export const DEFAULT_ORIGINS = ['http://localhost:3000', 'https://localhost:3000'];

export const EXPOSED_HEADERS = [
  'X-Response-Time',
  'X-RateLimit-Limit',
  'X-RateLimit-Remaining',
  'X-RateLimit-Reset',
  'X-Source',
];

/**
 * Comma-separated APPROVED_ORIGINS -> list; empty falls back to the defaults
 */
export const parseOrigins = (envOrigins?: string): string[] => {
  const origins = (envOrigins ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : DEFAULT_ORIGINS;
};

/**
 * Access-Control-Allow-Origin value for a request, or null when not allowed
 */
export const resolveAllowedOrigin = (origins: string[], requestOrigin: string): string | null => {
  if (origins.includes('*')) {
    return '*';
  }
  if (requestOrigin && origins.includes(requestOrigin)) {
    return requestOrigin;
  }
  return null;
};

/**
 * CORS middleware
 */
export const cors = (config: CorsConfig = {}): MiddlewareHandler => {
  const {
    origins = DEFAULT_ORIGINS,
    methods = ['GET', 'POST', 'OPTIONS'],
    allowedHeaders = ['Content-Type', 'Authorization'],
    exposedHeaders = EXPOSED_HEADERS,
    maxAge = 86400, // 24 hours
  } = config;

  return async (context, next) => {
    const requestOrigin = context.req.header('origin') ?? '';
    const allowedOrigin = resolveAllowedOrigin(origins, requestOrigin);

    if (context.req.method === 'OPTIONS') {
      const headers: Record<string, string> = {
        'Access-Control-Allow-Methods': methods.join(', '),
        'Access-Control-Allow-Headers': allowedHeaders.join(', '),
        'Access-Control-Max-Age': maxAge.toString(),
      };

      if (allowedOrigin) {
        headers['Access-Control-Allow-Origin'] = allowedOrigin;
        if (allowedOrigin !== '*') {
          headers['Vary'] = 'Origin';
        }
      }

      return new Response(null, {
        status: 204,
        headers,
      });
    }

    await next();

    if (allowedOrigin) {
      context.header('Access-Control-Allow-Origin', allowedOrigin);
      if (allowedOrigin !== '*') {
        context.header('Vary', 'Origin');
      }
    }
    context.header('Access-Control-Expose-Headers', exposedHeaders.join(', '));
  };
};

/**
 * Create CORS middleware with environment-based origins
 */
export const createCors = (envOrigins?: string): MiddlewareHandler => {
  return cors({ origins: parseOrigins(envOrigins) });
};
