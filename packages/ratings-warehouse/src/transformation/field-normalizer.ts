/**
 * Field Normalizer
 *
 * First stage of the transform: trims text, normalizes flag and date
 * metadata, and substitutes the staging sentinel for missing metadata.
 * Pure functions; the input record is never mutated.
 */

import { UNAVAILABLE } from '../core/constants.js';
import { toStagingField, type StagingField } from '../core/fields.js';
import type {
  FlagValue,
  RawOccupationRecord,
  RawSkaRecord,
  RawText,
} from '../core/types.js';

/**
 * Rating row after text cleanup, before numeric coercion
 */
export interface CleanSkaFields {
  readonly onetsoc_code: string;
  readonly element_id: string;
  /** Upper-cased */
  readonly scale_id: string;
  readonly data_value: string;
  readonly n: string;
  readonly standard_error: string;
  readonly lower_ci_bound: string;
  readonly upper_ci_bound: string;
  readonly recommend_suppress: StagingField<FlagValue>;
  readonly not_relevant: StagingField<FlagValue>;
  readonly date_updated: StagingField<string>;
  readonly domain_source: StagingField<string>;
}

/**
 * Occupation row after text cleanup
 */
export interface CleanOccupationFields {
  readonly onetsoc_code: string;
  readonly title: string;
  readonly description: StagingField<string>;
}

/**
 * Trim and collapse internal whitespace runs. Missing input becomes ''.
 */
export function normalizeSpace(text: RawText): string {
  return (text ?? '').trim().replace(/\s+/g, ' ');
}

const TRUE_FLAGS: ReadonlySet<string> = new Set(['Y', 'T', 'TRUE', '1']);
const FALSE_FLAGS: ReadonlySet<string> = new Set(['N', 'F', 'FALSE', '0']);

/**
 * Normalize a flag-like value to 'Y' / 'N'.
 *
 * Accepts Y/N, T/F, TRUE/FALSE and 1/0 in any case. Anything else,
 * including empty input and the sentinel itself, is unavailable.
 */
export function normalizeFlag(value: RawText): StagingField<FlagValue> {
  const s = normalizeSpace(value).toUpperCase();
  if (TRUE_FLAGS.has(s)) return 'Y';
  if (FALSE_FLAGS.has(s)) return 'N';
  return UNAVAILABLE;
}

const DATE_FORMATS: readonly {
  readonly pattern: RegExp;
  readonly order: readonly ['year' | 'month' | 'day', 'year' | 'month' | 'day', 'year' | 'month' | 'day'];
}[] = [
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ['year', 'month', 'day'] },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['month', 'day', 'year'] },
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, order: ['year', 'month', 'day'] },
];

/**
 * Normalize a date to ISO `YYYY-MM-DD`.
 *
 * Accepted inputs: `YYYY-MM-DD`, `MM/DD/YYYY`, `YYYY/MM/DD`. Impossible
 * calendar dates (Feb 30) and unrecognized formats are unavailable.
 */
export function normalizeDate(value: RawText): StagingField<string> {
  const s = normalizeSpace(value);
  if (!s) return UNAVAILABLE;

  for (const { pattern, order } of DATE_FORMATS) {
    const match = pattern.exec(s);
    if (!match) continue;

    const parts = { year: 0, month: 0, day: 0 };
    order.forEach((key, i) => {
      parts[key] = Number(match[i + 1]);
    });

    // setUTCFullYear keeps years 0-99 literal; Date.UTC maps them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
    if (
      date.getUTCFullYear() !== parts.year ||
      date.getUTCMonth() !== parts.month - 1 ||
      date.getUTCDate() !== parts.day
    ) {
      return UNAVAILABLE;
    }

    return date.toISOString().slice(0, 10);
  }

  return UNAVAILABLE;
}

/**
 * Normalize an occupation master row
 */
export function normalizeOccupationFields(record: RawOccupationRecord): CleanOccupationFields {
  return {
    onetsoc_code: normalizeSpace(record.onetsoc_code),
    title: normalizeSpace(record.title),
    description: toStagingField(normalizeSpace(record.description)),
  };
}

/**
 * Normalize a rating row's text fields and staging metadata
 */
export function normalizeSkaFields(record: RawSkaRecord): CleanSkaFields {
  return {
    onetsoc_code: normalizeSpace(record.onetsoc_code),
    element_id: normalizeSpace(record.element_id),
    scale_id: normalizeSpace(record.scale_id).toUpperCase(),
    data_value: normalizeSpace(record.data_value),
    n: normalizeSpace(record.n),
    standard_error: normalizeSpace(record.standard_error),
    lower_ci_bound: normalizeSpace(record.lower_ci_bound),
    upper_ci_bound: normalizeSpace(record.upper_ci_bound),
    recommend_suppress: normalizeFlag(record.recommend_suppress),
    not_relevant: normalizeFlag(record.not_relevant),
    date_updated: normalizeDate(record.date_updated),
    domain_source: toStagingField(normalizeSpace(record.domain_source)),
  };
}
