import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { collect, errorMessage, parsePositiveInt, parseVarPairs, splitVarList } from './utils.ts';

describe('parseVarPairs', () => {
  it('should parse pairs and let later ones win', () => {
    expect(parseVarPairs(['REGION=eu', 'URL=https://x?a=b', 'REGION=us', 'EMPTY='])).toEqual({
      vars: { REGION: 'us', URL: 'https://x?a=b', EMPTY: '' },
      warnings: [],
    });
  });

  it('should reject malformed pairs with a warning each', () => {
    const { vars, warnings } = parseVarPairs([
      'novalue',
      '=x',
      '1ABC=x',
      '__proto__=x',
      'NUL=a\u0000b',
      'OK=yes',
    ]);
    expect(vars).toEqual({ OK: 'yes' });
    expect(warnings).toEqual([
      'Invalid variable format: "novalue" (expected key=value)',
      'Invalid variable format: "=x" (expected key=value)',
      'Invalid variable name: "1ABC" (use letters, digits and underscores)',
      'Invalid variable name: "__proto__" (reserved keyword)',
      'Variable "NUL" contains invalid null characters',
    ]);
  });
});

describe('splitVarList', () => {
  it('should split on semicolons and drop blanks', () => {
    expect(splitVarList(' A=1; B=two words ;; ')).toEqual(['A=1', 'B=two words']);
    expect(splitVarList('')).toEqual([]);
  });
});

describe('collect', () => {
  it('should accumulate repeated option values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers only', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer, got "2.5"');
  });
});

describe('errorMessage', () => {
  it('should prefer the error message', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
