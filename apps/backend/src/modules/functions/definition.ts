import type { FunctionManifest, Grid } from '@quandl-sheets/shared-types';
import type { z } from 'zod';
import type { QuotaManager } from '../../utils/quota-manager';
import type { ResourceType } from '../cache';
import { bindArguments, parseArguments } from './params';

/**
 * What a function needs to reach Quandl
 */
export interface FunctionContext {
  apiUrl: string;
  apiKey: string;
  quota: QuotaManager;
}

/**
 * Validated call, ready to run or look up in the cache
 */
export interface PreparedCall {
  cacheParams: Record<string, string>;
  execute: (context: FunctionContext) => Promise<Grid>;
}

export interface FunctionDefinition<TInput> {
  manifest: FunctionManifest;
  resourceType: ResourceType;
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /** Custom positional binding; defaults to zipping onto manifest params */
  bind?: (args: readonly unknown[]) => Record<string, unknown>;
  cacheParams: (input: TInput) => Record<string, string>;
  handler: (input: TInput, context: FunctionContext) => Promise<Grid>;
}

export interface RegisteredFunction {
  manifest: FunctionManifest;
  resourceType: ResourceType;
  prepare: (args: readonly unknown[]) => PreparedCall;
}

/**
 * Hide the input type behind a uniform prepare/execute pair so the
 * registry can hold functions with different argument shapes.
 */
export const defineFunction = <TInput>(definition: FunctionDefinition<TInput>): RegisteredFunction => ({
  manifest: definition.manifest,
  resourceType: definition.resourceType,
  prepare: (args) => {
    const bound = definition.bind
      ? definition.bind(args)
      : bindArguments(definition.manifest, args);
    const input = parseArguments(definition.manifest.name, definition.schema, bound);

    return {
      cacheParams: definition.cacheParams(input),
      execute: (context) => definition.handler(input, context),
    };
  },
});
