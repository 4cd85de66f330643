/**
 * Numeric Coercer
 *
 * Converts the numeric text columns of a rating row. Unparsable input
 * becomes `null`; nothing is imputed. Only `data_value` is mandatory.
 */

import type { SkaNumericField } from '../core/types.js';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a decimal number, or return null.
 *
 * Rejects empty text, `NaN`, `Infinity`, hex and thousands separators.
 */
export function parseDecimal(text: string): number | null {
  const s = text.trim();
  if (!DECIMAL_PATTERN.test(s)) {
    return null;
  }
  const value = Number(s);
  return Number.isFinite(value) ? value : null;
}

export type NumericValues = { readonly [K in SkaNumericField]: number | null };

export type NumericCoercionResult =
  | { readonly ok: true; readonly values: NumericValues & { readonly data_value: number } }
  | { readonly ok: false; readonly reason: 'invalid_numeric_data_value'; readonly values: NumericValues };

/**
 * Coerce all numeric fields of a cleaned rating row
 */
export function coerceNumericFields(
  fields: { readonly [K in SkaNumericField]: string }
): NumericCoercionResult {
  const values = {
    data_value: parseDecimal(fields.data_value),
    n: parseDecimal(fields.n),
    standard_error: parseDecimal(fields.standard_error),
    lower_ci_bound: parseDecimal(fields.lower_ci_bound),
    upper_ci_bound: parseDecimal(fields.upper_ci_bound),
  };

  const dataValue = values.data_value;
  if (dataValue === null) {
    return { ok: false, reason: 'invalid_numeric_data_value', values };
  }

  return { ok: true, values: { ...values, data_value: dataValue } };
}
