/**
 * Quandl API Response Types
 */

/**
 * Raw cell as returned by Quandl (dates arrive as ISO strings)
 */
export type QuandlValue = string | number | boolean | null;

/**
 * Time-series dataset metadata and rows
 * Endpoint: /datasets/{database_code}/{dataset_code}
 */
export interface QuandlDataset {
  id?: number;
  dataset_code?: string;
  database_code?: string;
  name?: string;
  description?: string;
  refreshed_at?: string;
  newest_available_date?: string;
  oldest_available_date?: string;
  column_names: string[];
  frequency?: string;
  type?: string;
  premium?: boolean;
  limit?: number | null;
  transform?: string | null;
  column_index?: number | null;
  start_date?: string;
  end_date?: string;
  data: QuandlValue[][];
  collapse?: string | null;
  order?: 'asc' | 'desc' | null;
  database_id?: number;
}

export interface QuandlDatasetResponse {
  dataset: QuandlDataset;
}

/**
 * Datatable column descriptor
 */
export interface QuandlDatatableColumn {
  name: string;
  type?: string;
}

/**
 * Tabular datatable page
 * Endpoint: /datatables/{vendor_code}/{table_code}
 */
export interface QuandlDatatableResponse {
  datatable: {
    data: QuandlValue[][];
    columns: QuandlDatatableColumn[];
  };
  meta: {
    next_cursor_id: string | null;
  };
}

/**
 * Error envelope returned with non-2xx responses
 */
export interface QuandlErrorResponse {
  quandl_error: {
    code: string;
    message: string;
  };
}
