/**
 * Confidence interval repair: an inverted bound pair is swapped, never rejected.
 */

export interface ConfidenceInterval {
  readonly lower_ci_bound: number | null;
  readonly upper_ci_bound: number | null;
}

export interface RepairedInterval extends ConfidenceInterval {
  readonly repaired: boolean;
}

/**
 * Swap the bounds when both are present and lower > upper
 */
export function repairConfidenceInterval(interval: ConfidenceInterval): RepairedInterval {
  const { lower_ci_bound: lower, upper_ci_bound: upper } = interval;

  if (lower !== null && upper !== null && lower > upper) {
    return { lower_ci_bound: upper, upper_ci_bound: lower, repaired: true };
  }

  return { lower_ci_bound: lower, upper_ci_bound: upper, repaired: false };
}
