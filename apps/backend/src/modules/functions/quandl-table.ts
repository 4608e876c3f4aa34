import type {
  FunctionManifest,
  QuandlDatatableResponse,
  QuandlValue,
} from '@quandl-sheets/shared-types';
import { z } from 'zod';
import { getQuandlDatatablePage } from '../../pkg/util/quandl-api';
import { defineFunction } from './definition';
import { buildGrid, normalizeColumnName } from './grid';
import { bindArguments, filterSchema, nameSchema, propertiesSchema } from './params';
import { parseTableFilter, serializeTableFilter } from './table-filter';

/**
 * Pages requested after the first; 11 pages of 10k rows caps a call at ~100k rows
 */
export const MAX_FOLLOW_UP_PAGES = 10;

export const quandlTableManifest: FunctionManifest = {
  name: 'quandl-table',
  title: 'Quandl Table',
  description: 'Returns the contents of a table on Quandl',
  deployed: true,
  params: [
    {
      name: 'name',
      type: 'string',
      description: 'The name of the table to return',
      required: true,
    },
    {
      name: 'properties',
      type: 'array',
      description:
        'The properties to return (defaults to all properties). The properties are the columns/headers of the table being requested. Use "*" to return everything.',
      required: false,
      default: '*',
    },
    {
      name: 'filter',
      type: 'string',
      description:
        "Filter to apply with key/values specified as a URL query string. The keys allowed are table-dependent; see the Quandl documentation for each table to find out the filter parameters that are allowed. If a filter isn't specified, all the results up to the maximum result limit will be returned.",
      required: false,
      default: '',
    },
  ],
  examples: [
    '"SHARADAR/SF3"',
    '"SHARADAR/SF3", "ticker=AAPL"',
    '"SHARADAR/SF3", "*", "ticker=AAPL"',
    '"SHARADAR/SF3", "*", "investorname=VANGUARD GROUP INC"',
    '"SHARADAR/SF3", "*", "ticker=AAPL,MSFT&investorname=VANGUARD GROUP INC"',
  ],
  notes: 'Results are limited to 100k rows.',
};

const tableInputSchema = z.object({
  name: nameSchema,
  properties: propertiesSchema,
  filter: filterSchema.transform(parseTableFilter),
});

export type TableInput = z.infer<typeof tableInputSchema>;

/**
 * `(name, "ticker=AAPL")` is the documented short form: the second
 * argument is the filter, not a property list.
 */
export const bindTableArguments = (args: readonly unknown[]): Record<string, unknown> => {
  const [name, second] = args;
  if (args.length === 2 && typeof second === 'string' && second.includes('=')) {
    return { name, filter: second };
  }
  return bindArguments(quandlTableManifest, args);
};

export const quandlTable = defineFunction<TableInput>({
  manifest: quandlTableManifest,
  resourceType: 'quandl-table',
  schema: tableInputSchema,
  bind: bindTableArguments,
  cacheParams: (input) => ({
    name: input.name,
    properties: input.properties.map(normalizeColumnName).join(','),
    filter: serializeTableFilter(input.filter),
  }),
  handler: async (input, context) => {
    let columns: string[] = [];
    const rows: QuandlValue[][] = [];
    let cursorId: string | null = null;

    for (let page = 0; page <= MAX_FOLLOW_UP_PAGES; page++) {
      context.quota.reserveCall();

      const response: QuandlDatatableResponse = await getQuandlDatatablePage(
        input.name,
        input.filter,
        cursorId,
        context.apiUrl,
        context.apiKey,
      );

      if (page === 0) {
        columns = response.datatable.columns.map((column) => column.name);
      }
      rows.push(...response.datatable.data);
      cursorId = response.meta.next_cursor_id;

      if (!cursorId) {
        break;
      }
    }

    if (cursorId) {
      console.warn(`⚠️ [Table] ${input.name}: row limit reached, ${rows.length} rows returned`);
    }

    return buildGrid(columns, rows, input.properties);
  },
});
