import { describe, expect, it } from 'vitest';
import { FUNCTION_MANIFESTS, getFunction, listFunctions, parseFunctionReference } from './registry';

describe('registry', () => {
  it('should list manifests sorted by name', () => {
    expect(listFunctions().map((manifest) => manifest.name)).toEqual([
      'quandl-list',
      'quandl-series',
      'quandl-table',
    ]);
  });

  it('should describe parameters in positional order', () => {
    const series = FUNCTION_MANIFESTS.find((manifest) => manifest.name === 'quandl-series');
    expect(series?.params.map((param) => param.name)).toEqual(['name', 'properties', 'mindate', 'maxdate']);
    expect(series?.params[0].required).toBe(true);
  });

  it('should note the table row limit', () => {
    expect(getFunction({ name: 'quandl-table' })?.manifest.notes).toBe('Results are limited to 100k rows.');
  });

  describe('parseFunctionReference', () => {
    it('should split the owner from the name', () => {
      expect(parseFunctionReference('acme/quandl-series')).toEqual({ owner: 'acme', name: 'quandl-series' });
    });

    it('should accept a bare name', () => {
      expect(parseFunctionReference(' quandl-table ')).toEqual({ name: 'quandl-table' });
    });

    it('should keep nested owners together', () => {
      expect(parseFunctionReference('acme/finance/quandl-list')).toEqual({
        owner: 'acme/finance',
        name: 'quandl-list',
      });
    });

    it('should reject a missing name', () => {
      expect(parseFunctionReference('')).toBeNull();
      expect(parseFunctionReference('acme/')).toBeNull();
    });
  });

  describe('getFunction', () => {
    it('should ignore the owner and letter case', () => {
      expect(getFunction({ owner: 'someone-else', name: 'Quandl-Series' })?.manifest.name).toBe('quandl-series');
    });

    it('should return undefined for unknown names', () => {
      expect(getFunction({ name: 'quandl-unknown' })).toBeUndefined();
    });
  });
});
