/**
 * Numeric Coercer Tests
 */

import { describe, it, expect } from 'vitest';
import { coerceNumericFields, parseDecimal } from '../../../transformation/numeric-coercer.js';

describe('parseDecimal', () => {
  it.each([
    ['3.5', 3.5],
    ['-0.25', -0.25],
    ['+2', 2],
    ['.5', 0.5],
    ['4.', 4],
    ['1e2', 100],
    [' 7 ', 7],
  ])('parses %j as %d', (text, expected) => {
    expect(parseDecimal(text)).toBe(expected);
  });

  it.each(['', 'N/A', 'NaN', 'Infinity', '0x10', '1,000', '3.5.1', 'unavailable'])(
    'rejects %j',
    (text) => {
      expect(parseDecimal(text)).toBeNull();
    }
  );
});

describe('coerceNumericFields', () => {
  it('coerces every numeric column', () => {
    expect(
      coerceNumericFields({
        data_value: '3.5',
        n: '8',
        standard_error: '0.2',
        lower_ci_bound: '3.1',
        upper_ci_bound: '3.9',
      })
    ).toEqual({
      ok: true,
      values: { data_value: 3.5, n: 8, standard_error: 0.2, lower_ci_bound: 3.1, upper_ci_bound: 3.9 },
    });
  });

  it('keeps absent optional columns as null without imputing', () => {
    const result = coerceNumericFields({
      data_value: '2',
      n: '',
      standard_error: 'n/a',
      lower_ci_bound: '',
      upper_ci_bound: '',
    });

    expect(result).toEqual({
      ok: true,
      values: { data_value: 2, n: null, standard_error: null, lower_ci_bound: null, upper_ci_bound: null },
    });
  });

  it('fails when data_value does not parse', () => {
    const result = coerceNumericFields({
      data_value: 'N/A',
      n: '8',
      standard_error: '',
      lower_ci_bound: '',
      upper_ci_bound: '',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('invalid_numeric_data_value');
    }
  });
});
