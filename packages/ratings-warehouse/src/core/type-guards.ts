/**
 * Type Guards for the Ratings Warehouse
 *
 * Runtime narrowing for values that cross a text boundary: CLI arguments,
 * config files and rows read back from SQLite.
 */

import {
  REJECTION_REASONS,
  SKA_DOMAINS,
  type RejectionReason,
  type SkaDomain,
} from './constants.js';

/**
 * Type guard for rating domain tags
 */
export function isSkaDomain(value: unknown): value is SkaDomain {
  if (typeof value !== 'string') return false;
  const domains: readonly string[] = SKA_DOMAINS;
  return domains.includes(value);
}

/**
 * Type guard for quarantine reason codes
 */
export function isRejectionReason(value: unknown): value is RejectionReason {
  if (typeof value !== 'string') return false;
  const reasons: readonly string[] = REJECTION_REASONS;
  return reasons.includes(value);
}
