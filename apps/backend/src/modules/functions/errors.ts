/**
 * Invalid positional arguments for a pack function
 */
export class FunctionArgumentError extends Error {
  code = 'INVALID_ARGUMENTS';
  functionName: string;
  issues: string[];

  constructor(functionName: string, issues: string[]) {
    super(`Invalid arguments for ${functionName}: ${issues.join('; ')}`);
    this.name = 'FunctionArgumentError';
    this.functionName = functionName;
    this.issues = issues;
  }
}

export class FunctionNotFoundError extends Error {
  code = 'FUNCTION_NOT_FOUND';
  functionName: string;

  constructor(functionName: string) {
    super(`Unknown function: ${functionName}`);
    this.name = 'FunctionNotFoundError';
    this.functionName = functionName;
  }
}

/**
 * Malformed `=FLEX(...)` formula; position is the 0-based character offset
 */
export class FormulaSyntaxError extends Error {
  code = 'FORMULA_SYNTAX_ERROR';
  position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = 'FormulaSyntaxError';
    this.position = position;
  }
}
