/**
 * Function Pack Types
 *
 * Shared between the function service and spreadsheet clients.
 */

/**
 * A single spreadsheet cell
 */
export type CellValue = string | number | boolean;

/**
 * Two-dimensional result: header row followed by data rows
 */
export type Grid = CellValue[][];

export type ParamType = 'string' | 'array' | 'date';

export interface ParamManifest {
  name: string;
  type: ParamType;
  description: string;
  required: boolean;
  default?: string;
}

export interface FunctionManifest {
  name: string;
  title: string;
  description: string;
  deployed: boolean;
  params: ParamManifest[];
  examples: string[];
  notes?: string;
}

/**
 * `acme/quandl-series` -> { owner: 'acme', name: 'quandl-series' }
 */
export interface FunctionReference {
  owner?: string;
  name: string;
}

/**
 * Positional argument as it arrives from a formula or JSON body
 */
export type ArgumentValue = CellValue | null | ArgumentValue[];

export interface FunctionListResponse {
  status: 'success';
  data: FunctionManifest[];
}

export interface FunctionErrorResponse {
  status: 'error';
  code: string;
  message: string;
  error: string;
}
