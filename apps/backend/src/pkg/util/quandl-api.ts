import type {
  QuandlDatasetResponse,
  QuandlDatatableResponse,
  QuandlErrorResponse,
} from '@quandl-sheets/shared-types';
import { z } from 'zod';
import { logApiCall } from '../../utils/metrics';

/**
 * Retry policy for idempotent GETs
 * Delay before retry n (1-based) is backoffFactor * 2^(n-1) seconds.
 */
export interface RetryOptions {
  retries: number;
  backoffFactor: number;
  statusForcelist: readonly number[];
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 3,
  backoffFactor: 0.3,
  statusForcelist: [429, 500, 502, 503, 504],
};

export const NO_RETRY: RetryOptions = {
  retries: 0,
  backoffFactor: 0,
  statusForcelist: [],
};

/**
 * Maximum rows Quandl returns per datatable page
 */
export const DATATABLE_PAGE_SIZE = 10000;

/**
 * Date window for a dataset request (YYYY-MM-DD)
 */
export interface DatasetWindow {
  startDate?: string;
  endDate?: string;
}

/**
 * Error raised for failed or malformed Quandl responses
 */
export class QuandlApiError extends Error {
  code = 'QUANDL_API_ERROR';
  status: number;
  quandlCode?: string;

  constructor(message: string, status: number, quandlCode?: string) {
    super(message);
    this.name = 'QuandlApiError';
    this.status = status;
    this.quandlCode = quandlCode;
  }
}

const quandlValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const datasetResponseSchema = z.object({
  dataset: z
    .object({
      column_names: z.array(z.string()).default([]),
      data: z.array(z.array(quandlValueSchema)).default([]),
    })
    .default({}),
});

const datatableResponseSchema = z.object({
  datatable: z
    .object({
      data: z.array(z.array(quandlValueSchema)).default([]),
      columns: z
        .array(
          z.object({
            name: z.string().default(''),
            type: z.string().optional(),
          }),
        )
        .default([]),
    })
    .default({}),
  meta: z
    .object({
      next_cursor_id: z.string().nullable().optional(),
    })
    .default({}),
});

const quandlErrorSchema: z.ZodType<QuandlErrorResponse> = z.object({
  quandl_error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Join a `DATABASE/CODE` name onto a base path, encoding each segment
 */
const buildResourceUrl = (apiUrl: string, resource: string, name: string): URL => {
  const path = name
    .split('/')
    .map((segment) => encodeURIComponent(segment.trim()))
    .join('/');
  return new URL(`${apiUrl.replace(/\/+$/, '')}/${resource}/${path}`);
};

/**
 * URL safe for logs (api_key removed)
 */
export const redactApiKey = (url: URL): string => {
  const copy = new URL(url.toString());
  if (copy.searchParams.has('api_key')) {
    copy.searchParams.set('api_key', '***');
  }
  return copy.toString();
};

/**
 * Build an error from a non-2xx response, using Quandl's error envelope when present
 */
const toApiError = async (response: Response): Promise<QuandlApiError> => {
  const errorText = await response.text();
  let detail = errorText;
  let quandlCode: string | undefined;

  const parsed = quandlErrorSchema.safeParse(parseJson(errorText));
  if (parsed.success) {
    detail = parsed.data.quandl_error.message;
    quandlCode = parsed.data.quandl_error.code;
  }

  const prefix = response.status === 429 ? 'API rate limit exceeded' : 'API request failed';
  return new QuandlApiError(
    `${prefix}: ${response.status} ${response.statusText} - ${detail}`,
    response.status,
    quandlCode,
  );
};

/**
 * GET with retries on network errors and retryable status codes
 */
const fetchWithRetry = async (
  url: URL,
  retryOptions: RetryOptions,
): Promise<Response> => {
  let attempt = 0;

  while (true) {
    try {
      const response = await fetch(url.toString(), {
        method: 'GET',
        headers: {
          Accept: 'application/json',
        },
      });

      if (
        response.ok ||
        attempt >= retryOptions.retries ||
        !retryOptions.statusForcelist.includes(response.status)
      ) {
        return response;
      }

      console.warn(`⚠️ [Quandl] Status ${response.status}, retrying (attempt ${attempt + 1}/${retryOptions.retries})`);
      await response.body?.cancel();
    } catch (error) {
      if (attempt >= retryOptions.retries) {
        throw new QuandlApiError(
          `API request failed: ${error instanceof Error ? error.message : String(error)}`,
          502,
        );
      }
      console.warn(`⚠️ [Quandl] Network error, retrying (attempt ${attempt + 1}/${retryOptions.retries}):`, error);
    }

    attempt++;
    await sleep(retryOptions.backoffFactor * 1000 * 2 ** (attempt - 1));
  }
};

/**
 * Fetch, check status and parse JSON through a schema
 */
const requestJson = async <T>(
  url: URL,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
  retryOptions: RetryOptions,
): Promise<T> => {
  const safeUrl = redactApiKey(url);
  console.log(`🌐 [Quandl] URL: ${safeUrl}`);

  const startTime = performance.now();

  try {
    const response = await fetchWithRetry(url, retryOptions);
    const duration = performance.now() - startTime;

    if (!response.ok) {
      console.error(`❌ [Quandl] Error (${duration.toFixed(2)}ms): ${response.statusText}`);
      throw await toApiError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new QuandlApiError('Invalid API response: body is not JSON', 502);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new QuandlApiError(
        `Invalid API response: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        502,
      );
    }

    logApiCall(label, true, duration);
    console.log(`✅ [Quandl] Success (${duration.toFixed(2)}ms): ${label}`);
    return parsed.data;
  } catch (error) {
    logApiCall(
      label,
      false,
      performance.now() - startTime,
      error instanceof Error ? error.message : String(error),
    );
    throw error;
  }
};

/**
 * Fetch a time series from the Quandl API
 * Endpoint: /datasets/{database_code}/{dataset_code}?start_date&end_date
 */
export const getQuandlDataset = async (
  name: string,
  window: DatasetWindow,
  apiUrl?: string,
  apiKey?: string,
  retryOptions: RetryOptions = DEFAULT_RETRY_OPTIONS,
): Promise<QuandlDatasetResponse> => {
  console.log(
    `🌐 [Quandl] Request: dataset=${name}, start=${window.startDate ?? '-'}, end=${window.endDate ?? '-'}`,
  );

  if (!apiUrl || !apiKey) {
    throw new Error('API URL or API Key not provided');
  }

  const url = buildResourceUrl(apiUrl, 'datasets', name);
  url.searchParams.append('api_key', apiKey);
  if (window.startDate) {
    url.searchParams.append('start_date', window.startDate);
  }
  if (window.endDate) {
    url.searchParams.append('end_date', window.endDate);
  }

  return requestJson(url, datasetResponseSchema, `datasets/${name}`, retryOptions);
};

/**
 * Fetch one page of a datatable from the Quandl API
 * Endpoint: /datatables/{vendor_code}/{table_code}?<filter>&qopts.per_page&qopts.cursor_id
 */
export const getQuandlDatatablePage = async (
  name: string,
  filter: Record<string, string>,
  cursorId: string | null,
  apiUrl?: string,
  apiKey?: string,
  retryOptions: RetryOptions = NO_RETRY,
): Promise<QuandlDatatableResponse> => {
  console.log(
    `🌐 [Quandl] Request: datatable=${name}, cursor=${cursorId ?? 'first'}`,
  );

  if (!apiUrl || !apiKey) {
    throw new Error('API URL or API Key not provided');
  }

  const url = buildResourceUrl(apiUrl, 'datatables', name);
  Object.entries(filter).forEach(([filterKey, filterValue]) => {
    url.searchParams.append(filterKey, filterValue);
  });
  // Set after the filter so a filter cannot override these
  url.searchParams.set('api_key', apiKey);
  url.searchParams.set('qopts.per_page', DATATABLE_PAGE_SIZE.toString());
  if (cursorId) {
    url.searchParams.set('qopts.cursor_id', cursorId);
  } else {
    url.searchParams.delete('qopts.cursor_id');
  }

  const page = await requestJson(url, datatableResponseSchema, `datatables/${name}`, retryOptions);

  return {
    datatable: page.datatable,
    meta: { next_cursor_id: page.meta.next_cursor_id ?? null },
  };
};
