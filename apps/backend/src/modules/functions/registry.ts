import type { FunctionManifest, FunctionReference } from '@quandl-sheets/shared-types';
import type { RegisteredFunction } from './definition';
import { quandlList } from './quandl-list';
import { quandlSeries } from './quandl-series';
import { quandlTable } from './quandl-table';

const FUNCTIONS: readonly RegisteredFunction[] = [quandlList, quandlSeries, quandlTable];

const FUNCTIONS_BY_NAME = new Map<string, RegisteredFunction>(
  FUNCTIONS.map((definition) => [definition.manifest.name, definition]),
);

export const FUNCTION_MANIFESTS: readonly FunctionManifest[] = FUNCTIONS.map(
  (definition) => definition.manifest,
);

export const listFunctions = (): FunctionManifest[] =>
  [...FUNCTION_MANIFESTS].sort((a, b) => a.name.localeCompare(b.name));

/**
 * `"acme/quandl-series"` -> { owner: 'acme', name: 'quandl-series' }.
 * Returns null when there is no function name.
 */
export const parseFunctionReference = (text: string): FunctionReference | null => {
  const trimmed = text.trim();
  const slash = trimmed.lastIndexOf('/');
  const owner = slash >= 0 ? trimmed.slice(0, slash).trim() : '';
  const name = trimmed.slice(slash + 1).trim();

  if (!name) {
    return null;
  }
  return owner ? { owner, name } : { name };
};

/**
 * Resolve a function by name; the owner only namespaces the call
 */
export const getFunction = (reference: FunctionReference): RegisteredFunction | undefined =>
  FUNCTIONS_BY_NAME.get(reference.name.trim().toLowerCase());
