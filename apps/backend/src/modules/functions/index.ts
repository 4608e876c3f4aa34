export { createFormulaRoutes, createFunctionsRoutes, toErrorResponse } from './functions.routes';
export {
  EMPTY_GRID,
  type FunctionServiceResult,
  type FunctionSource,
  type FunctionsEnv,
  functionsService,
} from './functions.service';
export type { FunctionContext, PreparedCall, RegisteredFunction } from './definition';
export { FormulaSyntaxError, FunctionArgumentError, FunctionNotFoundError } from './errors';
export { FORMULA_FUNCTION, type ParsedFormula, parseFormula } from './formula';
export { FUNCTION_MANIFESTS, getFunction, listFunctions, parseFunctionReference } from './registry';
