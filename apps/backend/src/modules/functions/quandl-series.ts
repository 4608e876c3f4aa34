import type { FunctionManifest } from '@quandl-sheets/shared-types';
import { z } from 'zod';
import { getQuandlDataset } from '../../pkg/util/quandl-api';
import { defineFunction } from './definition';
import { buildGrid, normalizeColumnName } from './grid';
import { maxDateSchema, minDateSchema, nameSchema, propertiesSchema } from './params';

export const quandlSeriesManifest: FunctionManifest = {
  name: 'quandl-series',
  title: 'Quandl Series',
  description: 'Returns the contents of a time series on Quandl',
  deployed: true,
  params: [
    {
      name: 'name',
      type: 'string',
      description: 'The name of the time series to return',
      required: true,
    },
    {
      name: 'properties',
      type: 'array',
      description:
        'The properties to return (defaults to all properties). The properties are the columns/headers of the time series being requested. Use "*" to return everything.',
      required: false,
      default: '*',
    },
    {
      name: 'mindate',
      type: 'date',
      description: 'The minimum date for the time series to return',
      required: false,
      default: '1900-01-01',
    },
    {
      name: 'maxdate',
      type: 'date',
      description: 'The maximum date for the time series to return',
      required: false,
      default: '2099-12-31',
    },
  ],
  examples: [
    '"NASDAQOMX/XNDXT25"',
    '"NASDAQOMX/XNDXT25", "*"',
    '"NASDAQOMX/XNDXT25", "trade date, low, high"',
    '"NASDAQOMX/XNDXT25", "*", "2019-09-01", "2019-09-30"',
    '"NASDAQOMX/XNDXT25", "trade date, low, high", "2019-09-01", "2019-09-30"',
  ],
};

const seriesInputSchema = z
  .object({
    name: nameSchema,
    properties: propertiesSchema,
    mindate: minDateSchema,
    maxdate: maxDateSchema,
  })
  .refine((input) => input.mindate <= input.maxdate, {
    message: 'Must not be after maxdate',
    path: ['mindate'],
  });

export type SeriesInput = z.infer<typeof seriesInputSchema>;

export const quandlSeries = defineFunction<SeriesInput>({
  manifest: quandlSeriesManifest,
  resourceType: 'quandl-series',
  schema: seriesInputSchema,
  cacheParams: (input) => ({
    name: input.name,
    properties: input.properties.map(normalizeColumnName).join(','),
    mindate: input.mindate,
    maxdate: input.maxdate,
  }),
  handler: async (input, context) => {
    context.quota.reserveCall();

    const response = await getQuandlDataset(
      input.name,
      { startDate: input.mindate, endDate: input.maxdate },
      context.apiUrl,
      context.apiKey,
    );

    const { column_names: columns, data } = response.dataset;
    console.log(`📈 [Series] ${input.name}: ${data.length} rows, ${columns.length} columns`);

    return buildGrid(columns, data, input.properties);
  },
});
