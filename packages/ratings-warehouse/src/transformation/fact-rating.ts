/**
 * Staging row → fact row conversion.
 *
 * The only place a staging sentinel is turned back into NULL.
 */

import { toFactField } from '../core/fields.js';
import type { FactRatingRow, NormalizedSkaRow } from '../core/types.js';

export function toFactRating(row: NormalizedSkaRow): FactRatingRow {
  return {
    onetsoc_code: row.onetsoc_code,
    element_id: row.element_id,
    scale_id: row.scale_id,
    data_value: row.data_value,
    n: row.n,
    standard_error: row.standard_error,
    lower_ci_bound: row.lower_ci_bound,
    upper_ci_bound: row.upper_ci_bound,
    recommend_suppress: toFactField(row.recommend_suppress),
    not_relevant: toFactField(row.not_relevant),
    date_updated: toFactField(row.date_updated),
    domain_source: toFactField(row.domain_source),
  };
}
