/**
 * Confidence Interval Repair Tests
 */

import { describe, it, expect } from 'vitest';
import { repairConfidenceInterval } from '../../../transformation/ci-repairer.js';

describe('repairConfidenceInterval', () => {
  it('swaps inverted bounds', () => {
    expect(repairConfidenceInterval({ lower_ci_bound: 4.2, upper_ci_bound: 1.1 })).toEqual({
      lower_ci_bound: 1.1,
      upper_ci_bound: 4.2,
      repaired: true,
    });
  });

  it('leaves ordered and equal bounds alone', () => {
    expect(repairConfidenceInterval({ lower_ci_bound: 1.1, upper_ci_bound: 4.2 }).repaired).toBe(false);
    expect(repairConfidenceInterval({ lower_ci_bound: 3, upper_ci_bound: 3 }).repaired).toBe(false);
  });

  it('does nothing when a bound is missing', () => {
    expect(repairConfidenceInterval({ lower_ci_bound: 4.2, upper_ci_bound: null })).toEqual({
      lower_ci_bound: 4.2,
      upper_ci_bound: null,
      repaired: false,
    });
  });
});
