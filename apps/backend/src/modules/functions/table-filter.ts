/**
 * Parse a datatable filter expression (`ticker=AAPL&ticker=MSFT&date.gte=2020-01-01`).
 *
 * Repeated keys collapse into one comma list, which is how the datatables
 * endpoint takes multiple values: `{ ticker: 'AAPL,MSFT' }`.
 */
export const parseTableFilter = (expression: string): Record<string, string> => {
  const trimmed = expression.trim().replace(/^\?/, '');
  const merged = new Map<string, string[]>();

  new URLSearchParams(trimmed).forEach((rawValue, rawKey) => {
    const key = rawKey.trim();
    const value = rawValue.trim();
    if (!key || !value) {
      return;
    }
    const values = merged.get(key) ?? [];
    values.push(value);
    merged.set(key, values);
  });

  const filter: Record<string, string> = {};
  merged.forEach((values, key) => {
    filter[key] = values.join(',');
  });
  return filter;
};

/**
 * Stable text form of a parsed filter, used in cache keys
 */
export const serializeTableFilter = (filter: Record<string, string>): string =>
  Object.keys(filter)
    .sort()
    .map((key) => `${key}=${filter[key]}`)
    .join('&');
