/**
 * Occupation Transformer
 *
 * Cleans occupation master rows: trims text, drops repeated SOC codes
 * (first occurrence wins), derives the 2-digit major group and defaults a
 * missing description.
 *
 * There is no quarantine path here. A malformed code passes through with
 * whatever major group its prefix yields and is caught by the
 * dim_major_group foreign key at load time.
 */

import { toStagingField, type StagingField } from '../core/fields.js';
import type {
  NormalizedOccupation,
  OccupationTransformResult,
  RawOccupationRecord,
} from '../core/types.js';
import { normalizeOccupationFields } from './field-normalizer.js';

/**
 * Major group code: first two characters of the prefix before the hyphen
 *
 * @example deriveMajorGroupCode('11-1011.00') === '11'
 */
export function deriveMajorGroupCode(onetsocCode: string): StagingField<string> {
  const hyphen = onetsocCode.indexOf('-');
  if (hyphen < 0) {
    return toStagingField('');
  }
  return toStagingField(onetsocCode.slice(0, hyphen).slice(0, 2));
}

/**
 * Transform occupation master rows
 *
 * Rows without a code or title cannot satisfy the staging NOT NULL
 * columns and are counted in `skippedIncomplete`.
 */
export function transformOccupations(
  records: readonly RawOccupationRecord[]
): OccupationTransformResult {
  const seen = new Set<string>();
  const occupations: NormalizedOccupation[] = [];
  let duplicates = 0;
  let skippedIncomplete = 0;

  for (const record of records) {
    const fields = normalizeOccupationFields(record);

    if (!fields.onetsoc_code || !fields.title) {
      skippedIncomplete++;
      continue;
    }

    if (seen.has(fields.onetsoc_code)) {
      duplicates++;
      continue;
    }
    seen.add(fields.onetsoc_code);

    occupations.push({
      onetsoc_code: fields.onetsoc_code,
      title: fields.title,
      description: fields.description,
      major_group_code: deriveMajorGroupCode(fields.onetsoc_code),
    });
  }

  return {
    occupations,
    stats: {
      input: records.length,
      output: occupations.length,
      duplicates,
      skippedIncomplete,
    },
  };
}
