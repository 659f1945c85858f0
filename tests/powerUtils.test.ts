/**
 * Tests for power utility functions
 */

import { parsePowerKwText } from '../logic/utils/powerUtils';

describe('parsePowerKwText', () => {
  test('parses a comma-separated list', () => {
    expect(parsePowerKwText('1.5, 2.0, 1.8')).toEqual([1.5, 2.0, 1.8]);
  });

  test('parses a bracketed list', () => {
    expect(parsePowerKwText('[1.5, 2.0, -0.5]')).toEqual([1.5, 2.0, -0.5]);
  });

  test('accepts semicolons and whitespace as separators', () => {
    expect(parsePowerKwText('1;2 3')).toEqual([1, 2, 3]);
  });

  test('reads commas as separators, so decimals need a dot', () => {
    expect(parsePowerKwText('1,5, 2,0')).toEqual([1, 5, 2, 0]);
  });

  test('returns an empty list for blank input', () => {
    expect(parsePowerKwText('   ')).toEqual([]);
    expect(parsePowerKwText('[]')).toEqual([]);
  });

  test('keeps the position of unparseable values', () => {
    const values = parsePowerKwText('1.5, abc');

    expect(values).toHaveLength(2);
    expect(values[0]).toBe(1.5);
    expect(Number.isNaN(values[1])).toBe(true);
  });
});
