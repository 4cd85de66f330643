/**
 * Shared constants for the ratings warehouse pipeline
 *
 * Reason codes, domain tags and key formats referenced by the transform
 * core, the loader and the CLI. Kept in one place so that persisted
 * quarantine rows and reports always agree on spelling.
 */

// ============================================================================
// Sentinels
// ============================================================================

/**
 * Staging-only marker for a missing metadata value.
 *
 * Never written to the fact table; see `toFactField` in core/fields.ts.
 */
export const UNAVAILABLE = 'unavailable' as const;

export type Unavailable = typeof UNAVAILABLE;

// ============================================================================
// Domains and Scales
// ============================================================================

/**
 * Rated element domains (Skills, Knowledge, Abilities)
 */
export const SKA_DOMAINS = ['SKILL', 'KNOWLEDGE', 'ABILITY'] as const;

export type SkaDomain = (typeof SKA_DOMAINS)[number];

/**
 * Rating scales currently loaded into the warehouse
 *
 * IM = Importance, LV = Level
 */
export const SUPPORTED_SCALES = ['IM', 'LV'] as const;

// ============================================================================
// Key Formats
// ============================================================================

/**
 * SOC occupation code shape: two digits, hyphen, four digits, period, two digits
 *
 * @example '11-1011.00'
 */
export const SOC_CODE_PATTERN = /^\d{2}-\d{4}\.\d{2}$/;

/**
 * Same shape as a SQL LIKE mask, used by warehouse validation queries
 */
export const SOC_CODE_LIKE_MASK = '__-____.__';

// ============================================================================
// Rejection Reasons
// ============================================================================

/**
 * Quarantine reason codes in tie-break order.
 *
 * A row failing several checks is tagged with the earliest code in this list.
 */
export const REJECTION_REASONS = [
  'invalid_soc_format',
  'missing_element_id',
  'invalid_scale_id',
  'invalid_numeric_data_value',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

/**
 * Reasons produced by key validation (subset of REJECTION_REASONS)
 */
export type KeyRejectionReason = Exclude<RejectionReason, 'invalid_numeric_data_value'>;
