/**
 * Key Validator
 *
 * Checks a rating row's join keys against the SOC code shape and the
 * lookup registries. Predicates run in a fixed order and the first
 * failure is reported; the order is part of the quarantine contract.
 */

import { SOC_CODE_PATTERN, type KeyRejectionReason } from '../core/constants.js';
import type { LookupRegistries } from '../core/registries.js';

/**
 * Keys checked by the validator (already trimmed)
 */
export interface RatingKeys {
  readonly onetsoc_code: string;
  readonly element_id: string;
  readonly scale_id: string;
}

export type KeyValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: KeyRejectionReason };

/**
 * True when the code has the `NN-NNNN.NN` SOC shape
 */
export function isValidSocCode(code: string): boolean {
  return SOC_CODE_PATTERN.test(code);
}

/**
 * Validate the (onetsoc_code, element_id, scale_id) triple
 *
 * Order: SOC format, then element, then scale. An empty element id and an
 * id absent from the registry are the same failure.
 */
export function validateKeys(keys: RatingKeys, registries: LookupRegistries): KeyValidationResult {
  if (!isValidSocCode(keys.onetsoc_code)) {
    return { valid: false, reason: 'invalid_soc_format' };
  }

  if (!keys.element_id || !registries.elements.has(keys.element_id)) {
    return { valid: false, reason: 'missing_element_id' };
  }

  if (!registries.scales.has(keys.scale_id)) {
    return { valid: false, reason: 'invalid_scale_id' };
  }

  return { valid: true };
}
