/**
 * Core Type Definitions for the Ratings Warehouse
 *
 * Raw records arrive from the extractor as loosely-typed text. Normalized
 * rows are what the loader upserts into staging; invalid rows are what it
 * writes to the quarantine table.
 */

import type { RejectionReason, SkaDomain } from './constants.js';
import type { StagingField } from './fields.js';

// ============================================================================
// Raw Records (extractor output)
// ============================================================================

/**
 * A cell as extracted: text, or missing
 */
export type RawText = string | null | undefined;

/**
 * Occupation master row as extracted
 */
export interface RawOccupationRecord {
  readonly onetsoc_code?: RawText;
  readonly title?: RawText;
  readonly description?: RawText;
}

/**
 * Column names of a Skills/Knowledge/Abilities rating row
 */
export const SKA_FIELDS = [
  'onetsoc_code',
  'element_id',
  'scale_id',
  'data_value',
  'n',
  'standard_error',
  'lower_ci_bound',
  'upper_ci_bound',
  'recommend_suppress',
  'not_relevant',
  'date_updated',
  'domain_source',
] as const;

export type SkaField = (typeof SKA_FIELDS)[number];

/**
 * Numeric columns of a rating row
 */
export const SKA_NUMERIC_FIELDS = [
  'data_value',
  'n',
  'standard_error',
  'lower_ci_bound',
  'upper_ci_bound',
] as const;

export type SkaNumericField = (typeof SKA_NUMERIC_FIELDS)[number];

/**
 * Rating row as extracted. Every field is text or missing.
 */
export type RawSkaRecord = { readonly [K in SkaField]?: RawText };

// ============================================================================
// Normalized Rows (transform output)
// ============================================================================

/**
 * Cleaned occupation master row
 */
export interface NormalizedOccupation {
  readonly onetsoc_code: string;
  readonly title: string;
  readonly description: StagingField<string>;
  /** First two characters of the SOC prefix before the hyphen */
  readonly major_group_code: StagingField<string>;
}

/**
 * Recommend-suppress / not-relevant flags after normalization
 */
export type FlagValue = 'Y' | 'N';

/**
 * Cleaned rating row, ready for staging upsert
 *
 * Numeric fields are `null` when absent; they are never defaulted.
 */
export interface NormalizedSkaRow {
  readonly domain: SkaDomain;
  readonly onetsoc_code: string;
  readonly element_id: string;
  readonly scale_id: string;
  readonly data_value: number;
  readonly n: number | null;
  readonly standard_error: number | null;
  readonly lower_ci_bound: number | null;
  readonly upper_ci_bound: number | null;
  readonly recommend_suppress: StagingField<FlagValue>;
  readonly not_relevant: StagingField<FlagValue>;
  /** ISO-8601 calendar date (YYYY-MM-DD) */
  readonly date_updated: StagingField<string>;
  readonly domain_source: StagingField<string>;
}

/**
 * Quarantined rating row: the original field values, verbatim
 */
export type InvalidSkaRow = { readonly [K in SkaField]: string | null } & {
  readonly domain: SkaDomain;
  readonly error_reason: RejectionReason;
};

// ============================================================================
// Transform Results
// ============================================================================

/**
 * Per-domain transform counters
 *
 * `input === valid + invalid` always holds.
 */
export interface PartitionStats {
  readonly domain: SkaDomain;
  readonly input: number;
  readonly valid: number;
  readonly invalid: number;
  readonly byReason: Readonly<Record<RejectionReason, number>>;
  /** Valid rows whose CI bounds were swapped */
  readonly ciRepairs: number;
}

/**
 * Result of partitioning one domain's rating rows
 */
export interface SkaPartition {
  readonly valid: readonly NormalizedSkaRow[];
  readonly invalid: readonly InvalidSkaRow[];
  readonly stats: PartitionStats;
}

/**
 * Occupation transform counters
 */
export interface OccupationStats {
  readonly input: number;
  readonly output: number;
  readonly duplicates: number;
  /** Rows without a code or title, which cannot be loaded */
  readonly skippedIncomplete: number;
}

/**
 * Result of transforming occupation master rows
 */
export interface OccupationTransformResult {
  readonly occupations: readonly NormalizedOccupation[];
  readonly stats: OccupationStats;
}

// ============================================================================
// Fact Representation
// ============================================================================

/**
 * Rating row as written to the fact table (no staging sentinels)
 */
export interface FactRatingRow {
  readonly onetsoc_code: string;
  readonly element_id: string;
  readonly scale_id: string;
  readonly data_value: number;
  readonly n: number | null;
  readonly standard_error: number | null;
  readonly lower_ci_bound: number | null;
  readonly upper_ci_bound: number | null;
  readonly recommend_suppress: FlagValue | null;
  readonly not_relevant: FlagValue | null;
  readonly date_updated: string | null;
  readonly domain_source: string | null;
}
