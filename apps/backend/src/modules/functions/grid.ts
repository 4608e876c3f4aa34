import type { CellValue, Grid, QuandlValue } from '@quandl-sheets/shared-types';
import { WILDCARD } from './params';

/**
 * Lower-case and trim, so `' Close'` selects column `Close`
 */
export const normalizeColumnName = (name: string): string => name.trim().toLowerCase();

/**
 * Resolve requested properties against the available columns.
 * A lone `*` selects every column in source order.
 */
export const selectProperties = (properties: readonly string[], columns: readonly string[]): string[] => {
  const requested = properties.map(normalizeColumnName);
  if (requested.length === 1 && requested[0] === WILDCARD) {
    return columns.map(normalizeColumnName);
  }
  return requested;
};

export const toCell = (value: QuandlValue | undefined): CellValue =>
  value === null || value === undefined ? '' : value;

/**
 * Project rows onto the selected properties by column name.
 * Unknown properties and short rows yield empty cells.
 */
export const projectRows = (
  rows: readonly (readonly QuandlValue[])[],
  columns: readonly string[],
  properties: readonly string[],
): Grid => {
  const indexByName = new Map<string, number>();
  columns.forEach((column, index) => {
    indexByName.set(normalizeColumnName(column), index);
  });

  return rows.map((row) =>
    properties.map((property) => {
      const index = indexByName.get(property);
      return index === undefined ? '' : toCell(row[index]);
    }),
  );
};

/**
 * Header row of selected properties followed by the projected data rows
 */
export const buildGrid = (
  columns: readonly string[],
  rows: readonly (readonly QuandlValue[])[],
  properties: readonly string[],
): Grid => {
  const selected = selectProperties(properties, columns);
  return [selected, ...projectRows(rows, columns, selected)];
};
