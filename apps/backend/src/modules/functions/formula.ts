import type { ArgumentValue, CellValue, FunctionReference } from '@quandl-sheets/shared-types';
import { FormulaSyntaxError } from './errors';
import { parseFunctionReference } from './registry';

export const FORMULA_FUNCTION = 'FLEX';

export interface ParsedFormula {
  reference: FunctionReference;
  args: ArgumentValue[];
}

const NUMBER_PATTERN = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*/;

/**
 * Recursive-descent reader over one formula string
 */
class FormulaReader {
  private position = 0;

  constructor(private readonly text: string) {}

  parse(): ParsedFormula {
    this.skipWhitespace();
    if (!this.consume('=')) {
      this.fail("Formula must start with '='");
    }

    this.skipWhitespace();
    const nameStart = this.position;
    const identifier = this.match(IDENTIFIER_PATTERN);
    if (!identifier) {
      this.fail('Expected function name');
    }
    if (identifier.toUpperCase() !== FORMULA_FUNCTION) {
      throw new FormulaSyntaxError(`Unknown formula function ${identifier}`, nameStart);
    }

    this.skipWhitespace();
    if (!this.consume('(')) {
      this.fail("Expected '('");
    }

    const args = this.readArguments();

    this.skipWhitespace();
    if (this.position < this.text.length) {
      this.fail('Unexpected trailing input');
    }

    const [first, ...rest] = args;
    if (typeof first !== 'string') {
      throw new FormulaSyntaxError('First argument must be a function name string', nameStart);
    }
    const reference = parseFunctionReference(first);
    if (!reference) {
      throw new FormulaSyntaxError(`Invalid function reference "${first}"`, nameStart);
    }

    return { reference, args: rest };
  }

  /**
   * Reads up to and including ')'. An empty slot between commas is a skipped argument.
   */
  private readArguments(): ArgumentValue[] {
    const args: ArgumentValue[] = [];

    this.skipWhitespace();
    if (this.consume(')')) {
      return args;
    }

    while (true) {
      this.skipWhitespace();
      const next = this.peek();
      if (next === ',' || next === ')') {
        args.push(null);
      } else {
        args.push(this.readArgument());
      }

      this.skipWhitespace();
      if (this.consume(')')) {
        return args;
      }
      if (!this.consume(',')) {
        this.fail("Expected ',' or ')'");
      }
    }
  }

  private readArgument(): ArgumentValue {
    if (this.peek() === '{') {
      return this.readArray();
    }
    return this.readScalar();
  }

  /**
   * `{1,2,3}` is one row (a flat list); `{1,2;3,4}` is a list of rows
   */
  private readArray(): ArgumentValue {
    const start = this.position;
    this.consume('{');

    const rows: CellValue[][] = [];
    let row: CellValue[] = [];

    while (true) {
      this.skipWhitespace();
      if (this.position >= this.text.length) {
        throw new FormulaSyntaxError('Unterminated array', start);
      }
      row.push(this.readScalar());
      this.skipWhitespace();

      if (this.consume(',')) {
        continue;
      }
      if (this.consume(';')) {
        rows.push(row);
        row = [];
        continue;
      }
      if (this.consume('}')) {
        rows.push(row);
        break;
      }
      if (this.position >= this.text.length) {
        throw new FormulaSyntaxError('Unterminated array', start);
      }
      this.fail("Expected ',', ';' or '}'");
    }

    const width = rows[0].length;
    if (rows.some((cells) => cells.length !== width)) {
      throw new FormulaSyntaxError('Array rows must have the same number of columns', start);
    }

    return rows.length === 1 ? rows[0] : rows;
  }

  private readScalar(): CellValue {
    if (this.peek() === '"') {
      return this.readString();
    }

    const numberText = this.match(NUMBER_PATTERN);
    if (numberText) {
      return Number(numberText);
    }

    const start = this.position;
    const word = this.match(IDENTIFIER_PATTERN);
    if (word?.toUpperCase() === 'TRUE') {
      return true;
    }
    if (word?.toUpperCase() === 'FALSE') {
      return false;
    }
    if (word) {
      throw new FormulaSyntaxError(`Unexpected identifier ${word}`, start);
    }

    if (this.position >= this.text.length) {
      this.fail('Unexpected end of formula');
    }
    this.fail(`Unexpected character '${this.peek()}'`);
  }

  /**
   * Double-quoted; `""` inside is a literal quote
   */
  private readString(): string {
    const start = this.position;
    this.consume('"');
    let value = '';

    while (this.position < this.text.length) {
      const char = this.text[this.position];
      if (char === '"') {
        if (this.text[this.position + 1] === '"') {
          value += '"';
          this.position += 2;
          continue;
        }
        this.position++;
        return value;
      }
      value += char;
      this.position++;
    }

    throw new FormulaSyntaxError('Unterminated string', start);
  }

  private peek(): string | undefined {
    return this.text[this.position];
  }

  private consume(expected: string): boolean {
    if (this.text[this.position] === expected) {
      this.position++;
      return true;
    }
    return false;
  }

  private match(pattern: RegExp): string | null {
    const found = pattern.exec(this.text.slice(this.position));
    if (!found) {
      return null;
    }
    this.position += found[0].length;
    return found[0];
  }

  private skipWhitespace(): void {
    while (this.position < this.text.length && /\s/.test(this.text[this.position])) {
      this.position++;
    }
  }

  private fail(message: string): never {
    throw new FormulaSyntaxError(message, this.position);
  }
}

/**
 * Parse `=FLEX("acme/quandl-series", "NASDAQOMX/XNDXT25", "*", 43709)` into
 * a function reference and its positional arguments.
 */
export const parseFormula = (formula: string): ParsedFormula => new FormulaReader(formula).parse();
