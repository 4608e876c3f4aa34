import type { MiddlewareHandler } from 'hono';

/**
 * Header name -> value; false leaves the header off
 */
export interface SecureHeadersConfig {
  hsts?: string | false;
  contentTypeOptions?: string | false;
  frameOptions?: string | false;
  contentSecurityPolicy?: string | false;
  referrerPolicy?: string | false;
}

const HEADER_NAMES: Record<keyof SecureHeadersConfig, string> = {
  hsts: 'Strict-Transport-Security',
  contentTypeOptions: 'X-Content-Type-Options',
  frameOptions: 'X-Frame-Options',
  contentSecurityPolicy: 'Content-Security-Policy',
  referrerPolicy: 'Referrer-Policy',
};

const HEADER_OPTIONS = [
  'hsts',
  'contentTypeOptions',
  'frameOptions',
  'contentSecurityPolicy',
  'referrerPolicy',
] as const satisfies readonly (keyof SecureHeadersConfig)[];

/**
 * JSON-only API: nothing is framed, scripted or embedded
 */
const defaultConfig: Required<SecureHeadersConfig> = {
  hsts: 'max-age=63072000; includeSubDomains',
  contentTypeOptions: 'nosniff',
  frameOptions: 'DENY',
  contentSecurityPolicy: "default-src 'none'; frame-ancestors 'none'",
  referrerPolicy: 'no-referrer',
};

/**
 * Secure headers middleware
 * Adds security-related HTTP headers to every response
 */
export const secureHeaders = (config: SecureHeadersConfig = {}): MiddlewareHandler => {
  const mergedConfig: Required<SecureHeadersConfig> = { ...defaultConfig, ...config };
  const headers = HEADER_OPTIONS.flatMap((option): [string, string][] => {
    const value = mergedConfig[option];
    return value ? [[HEADER_NAMES[option], value]] : [];
  });

  return async (context, next) => {
    await next();

    for (const [headerName, value] of headers) {
      context.header(headerName, value);
    }
  };
};
