import type { FunctionManifest } from '@quandl-sheets/shared-types';
import { z } from 'zod';
import { getQuandlDataset, NO_RETRY } from '../../pkg/util/quandl-api';
import { defineFunction } from './definition';
import { buildGrid, normalizeColumnName } from './grid';
import { nameSchema, propertiesSchema } from './params';

export const quandlListManifest: FunctionManifest = {
  name: 'quandl-list',
  title: 'Quandl List Table',
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
        'The properties to return (defaults to all properties). The properties are the columns/headers of the table or series being requested. Use "*" to return everything.',
      required: false,
      default: '*',
    },
  ],
  examples: ['"HKEX/83079"', '"HKEX/83079", "*"', '"HKEX/83079", "date, nominal price, high, low"'],
};

const listInputSchema = z.object({
  name: nameSchema,
  properties: propertiesSchema,
});

export type ListInput = z.infer<typeof listInputSchema>;

/**
 * Whole dataset, no date window, one attempt
 */
export const quandlList = defineFunction<ListInput>({
  manifest: quandlListManifest,
  resourceType: 'quandl-list',
  schema: listInputSchema,
  cacheParams: (input) => ({
    name: input.name,
    properties: input.properties.map(normalizeColumnName).join(','),
  }),
  handler: async (input, context) => {
    context.quota.reserveCall();

    const response = await getQuandlDataset(input.name, {}, context.apiUrl, context.apiKey, NO_RETRY);
    return buildGrid(response.dataset.column_names, response.dataset.data, input.properties);
  },
});
