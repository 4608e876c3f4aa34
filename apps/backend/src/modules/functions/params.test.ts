import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FunctionArgumentError } from './errors';
import {
  bindArguments,
  filterSchema,
  maxDateSchema,
  minDateSchema,
  nameSchema,
  parseArguments,
  propertiesSchema,
  toPropertyList,
} from './params';
import { quandlSeriesManifest } from './quandl-series';

const firstIssue = (result: { error?: z.ZodError }): string | undefined =>
  result.error?.issues[0]?.message;

describe('params', () => {
  describe('bindArguments', () => {
    it('should zip positional values onto parameter names', () => {
      expect(bindArguments(quandlSeriesManifest, ['NASDAQOMX/XNDXT25', '*', 43709, 43738])).toEqual({
        name: 'NASDAQOMX/XNDXT25',
        properties: '*',
        mindate: 43709,
        maxdate: 43738,
      });
    });

    it('should leave missing trailing values unbound', () => {
      expect(bindArguments(quandlSeriesManifest, ['NASDAQOMX/XNDXT25'])).toEqual({
        name: 'NASDAQOMX/XNDXT25',
      });
    });

    it('should ignore extra positional values', () => {
      const bound = bindArguments(quandlSeriesManifest, ['a', 'b', 'c', 'd', 'e']);
      expect(Object.keys(bound)).toEqual(['name', 'properties', 'mindate', 'maxdate']);
    });
  });

  describe('nameSchema', () => {
    it('should trim strings and coerce numbers', () => {
      expect(nameSchema.parse('  HKEX/83079 ')).toBe('HKEX/83079');
      expect(nameSchema.parse(83079)).toBe('83079');
    });

    it('should require a value', () => {
      expect(firstIssue(nameSchema.safeParse(undefined))).toBe('Required');
      expect(firstIssue(nameSchema.safeParse('   '))).toBe('Required');
    });

    it('should reject other types', () => {
      expect(firstIssue(nameSchema.safeParse(true))).toBe('Must be a string');
    });
  });

  describe('propertiesSchema', () => {
    it('should default to every property', () => {
      expect(propertiesSchema.parse(undefined)).toEqual(['*']);
      expect(propertiesSchema.parse(null)).toEqual(['*']);
      expect(propertiesSchema.parse('')).toEqual(['*']);
      expect(propertiesSchema.parse([])).toEqual(['*']);
    });

    it('should split a comma list', () => {
      expect(propertiesSchema.parse('trade date, low,high')).toEqual(['trade date', ' low', 'high']);
    });

    it('should flatten a range and drop blank cells', () => {
      expect(
        propertiesSchema.parse([
          ['date', 'high'],
          ['low', ''],
        ]),
      ).toEqual(['date', 'high', 'low']);
      expect(propertiesSchema.parse(['date', null, 'close'])).toEqual(['date', 'close']);
    });

    it('should reject lists with non-string values', () => {
      expect(firstIssue(propertiesSchema.safeParse(['date', 1]))).toBe(
        'Must be a list with only string values',
      );
    });

    it('should reject other types', () => {
      expect(firstIssue(propertiesSchema.safeParse(5))).toBe('Must be a string or a list of strings');
    });
  });

  describe('toPropertyList', () => {
    it('should fall back to the wildcard when only blanks remain', () => {
      expect(toPropertyList(' , ')).toEqual(['*']);
    });
  });

  describe('date schemas', () => {
    it('should apply defaults for missing values', () => {
      expect(minDateSchema.parse(undefined)).toBe('1900-01-01');
      expect(maxDateSchema.parse('')).toBe('2099-12-31');
    });

    it('should convert serial numbers and date strings', () => {
      expect(minDateSchema.parse(43709)).toBe('2019-09-01');
      expect(maxDateSchema.parse('2019-9-30')).toBe('2019-09-30');
    });

    it('should reject unparseable dates', () => {
      expect(firstIssue(minDateSchema.safeParse('yesterday'))).toBe('Invalid date: yesterday');
      expect(firstIssue(minDateSchema.safeParse(true))).toBe(
        'Must be a date (YYYY-MM-DD) or a spreadsheet date number',
      );
    });
  });

  describe('filterSchema', () => {
    it('should default to an empty filter and trim', () => {
      expect(filterSchema.parse(undefined)).toBe('');
      expect(filterSchema.parse(' ticker=AAPL ')).toBe('ticker=AAPL');
    });

    it('should reject non-string values', () => {
      expect(firstIssue(filterSchema.safeParse(['ticker=AAPL']))).toBe('Must be a string');
    });
  });

  describe('parseArguments', () => {
    const schema = z.object({ name: nameSchema, properties: propertiesSchema });

    it('should return parsed values', () => {
      expect(parseArguments('quandl-list', schema, { name: 'HKEX/83079' })).toEqual({
        name: 'HKEX/83079',
        properties: ['*'],
      });
    });

    it('should throw FunctionArgumentError listing each issue by field', () => {
      try {
        parseArguments('quandl-list', schema, { properties: 7 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FunctionArgumentError);
        if (error instanceof FunctionArgumentError) {
          expect(error.issues).toEqual(['name: Required', 'properties: Must be a string or a list of strings']);
          expect(error.message).toBe(
            'Invalid arguments for quandl-list: name: Required; properties: Must be a string or a list of strings',
          );
        }
      }
    });
  });
});
