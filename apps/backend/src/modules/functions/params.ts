import type { FunctionManifest } from '@quandl-sheets/shared-types';
import { z } from 'zod';
import { FunctionArgumentError } from './errors';
import { toIsoDate } from './spreadsheet-date';

export const WILDCARD = '*';
export const DEFAULT_MIN_DATE = '1900-01-01';
export const DEFAULT_MAX_DATE = '2099-12-31';

/**
 * Skipped spreadsheet arguments arrive as null or an empty string
 */
const blankToUndefined = (value: unknown): unknown =>
  value === null || value === '' ? undefined : value;

/**
 * `"a, b"` -> ['a', ' b']. Blank entries are dropped; nothing left means
 * every property.
 */
export const toPropertyList = (value: string | string[]): string[] => {
  const items = typeof value === 'string' ? value.split(',') : value;
  const present = items.filter((item) => item.trim() !== '');
  return present.length > 0 ? present : [WILDCARD];
};

/**
 * A range arrives as a list of rows; flatten one level and drop blank cells
 */
const flattenCells = (entries: unknown[]): unknown[] => {
  const cells: unknown[] = [];
  for (const entry of entries) {
    const row: unknown[] = Array.isArray(entry) ? entry : [entry];
    for (const cell of row) {
      if (cell !== null && cell !== '') {
        cells.push(cell);
      }
    }
  }
  return cells;
};

const isStringList = (cells: unknown[]): cells is string[] =>
  cells.every((cell) => typeof cell === 'string');

export const nameSchema = z
  .union([z.string(), z.number()], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined || ctx.data === null ? 'Required' : 'Must be a string',
    }),
  })
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'Required'));

export const propertiesSchema = z.unknown().transform((value, ctx): string[] => {
  const present = blankToUndefined(value);
  if (present === undefined) {
    return [WILDCARD];
  }
  if (typeof present === 'string') {
    return toPropertyList(present);
  }
  if (Array.isArray(present)) {
    const cells = flattenCells(present);
    if (isStringList(cells)) {
      return toPropertyList(cells);
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Must be a list with only string values',
    });
    return z.NEVER;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Must be a string or a list of strings',
  });
  return z.NEVER;
});

const dateSchema = (fallback: string) =>
  z.preprocess(
    blankToUndefined,
    z
      .union([z.number(), z.string()], {
        errorMap: () => ({ message: 'Must be a date (YYYY-MM-DD) or a spreadsheet date number' }),
      })
      .default(fallback)
      .transform((value, ctx) => {
        const isoDate = toIsoDate(value);
        if (isoDate === null) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid date: ${String(value)}`,
          });
          return z.NEVER;
        }
        return isoDate;
      }),
  );

export const minDateSchema = dateSchema(DEFAULT_MIN_DATE);
export const maxDateSchema = dateSchema(DEFAULT_MAX_DATE);

export const filterSchema = z.preprocess(
  blankToUndefined,
  z
    .union([z.string(), z.number()], {
      errorMap: () => ({ message: 'Must be a string' }),
    })
    .default('')
    .transform((value) => String(value).trim()),
);

/**
 * Map positional values onto the manifest's parameter names.
 * Extra positional values are ignored.
 */
export const bindArguments = (
  manifest: FunctionManifest,
  args: readonly unknown[],
): Record<string, unknown> => {
  const bound: Record<string, unknown> = {};
  manifest.params.forEach((param, index) => {
    if (index < args.length) {
      bound[param.name] = args[index];
    }
  });
  return bound;
};

/**
 * Validate bound arguments, turning schema issues into a FunctionArgumentError
 */
export const parseArguments = <T>(
  functionName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  bound: Record<string, unknown>,
): T => {
  const result = schema.safeParse(bound);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new FunctionArgumentError(functionName, issues);
  }
  return result.data;
};
