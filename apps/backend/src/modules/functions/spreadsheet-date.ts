import { addDays, format, isValid, parse } from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{1,2}-\d{1,2}$/;

/**
 * Convert a spreadsheet serial date to YYYY-MM-DD.
 *
 * Serial 1 is 1900-01-01. Spreadsheets count a 1900-02-29 that never
 * existed (serial 60), so serials from 61 on are shifted back one day;
 * serial 60 resolves to 1900-03-01. The fractional (time) part is dropped.
 */
export const fromSpreadsheetSerial = (serial: number): string | null => {
  if (!Number.isFinite(serial) || serial < 1) {
    return null;
  }
  const day = Math.floor(serial);
  const offset = day < 61 ? day : day - 1;
  return format(addDays(new Date(1899, 11, 31), offset), 'yyyy-MM-dd');
};

/**
 * Parse YYYY-MM-DD (month and day may be unpadded) to a normalised date string
 */
export const parseIsoDate = (value: string): string | null => {
  const trimmed = value.trim();
  if (!DATE_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = parse(trimmed, 'yyyy-M-d', new Date());
  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : null;
};

/**
 * Spreadsheet date argument: serial number or date string
 */
export const toIsoDate = (value: number | string): string | null => {
  return typeof value === 'number' ? fromSpreadsheetSerial(value) : parseIsoDate(value);
};
