/**
 * Staging vs. fact field semantics
 *
 * Staging tables use the literal `'unavailable'` for missing metadata so
 * that NOT NULL staging columns can be loaded. Fact rows must keep real
 * absence (NULL). The two representations are distinct types and only
 * meet in `toFactField`.
 */

import { UNAVAILABLE, type Unavailable } from './constants.js';

/**
 * A value, or the staging sentinel `'unavailable'`
 */
export type StagingField<T> = T | Unavailable;

/**
 * A value, or a true absence (SQL NULL)
 */
export type FactField<T> = T | null;

/**
 * Wrap a possibly-missing value for staging.
 *
 * `null`, `undefined` and the empty string all become the sentinel.
 */
export function toStagingField<T>(value: T | null | undefined): StagingField<T> {
  if (value === null || value === undefined || value === '') {
    return UNAVAILABLE;
  }
  return value;
}

/**
 * Convert a staging field to its fact-level form (sentinel → null)
 */
export function toFactField<T>(value: StagingField<T>): FactField<T> {
  return value === UNAVAILABLE ? null : value;
}

/**
 * True when a staging field holds the sentinel
 */
export function isUnavailable(value: unknown): value is Unavailable {
  return value === UNAVAILABLE;
}
