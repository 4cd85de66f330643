/**
 * Fact Row Conversion Tests
 */

import { describe, it, expect } from 'vitest';
import type { NormalizedSkaRow } from '../../../core/types.js';
import { toFactRating } from '../../../transformation/fact-rating.js';

describe('toFactRating', () => {
  const row: NormalizedSkaRow = {
    domain: 'SKILL',
    onetsoc_code: '15-1252.00',
    element_id: '2.A.1.b',
    scale_id: 'IM',
    data_value: 3.5,
    n: null,
    standard_error: null,
    lower_ci_bound: 1.1,
    upper_ci_bound: 4.2,
    recommend_suppress: 'N',
    not_relevant: 'unavailable',
    date_updated: 'unavailable',
    domain_source: 'Analyst',
  };

  it('turns staging sentinels into null', () => {
    const fact = toFactRating(row);

    expect(fact.not_relevant).toBeNull();
    expect(fact.date_updated).toBeNull();
  });

  it('keeps present values and drops the domain tag', () => {
    expect(toFactRating(row)).toEqual({
      onetsoc_code: '15-1252.00',
      element_id: '2.A.1.b',
      scale_id: 'IM',
      data_value: 3.5,
      n: null,
      standard_error: null,
      lower_ci_bound: 1.1,
      upper_ci_bound: 4.2,
      recommend_suppress: 'N',
      not_relevant: null,
      date_updated: null,
      domain_source: 'Analyst',
    });
  });
});
