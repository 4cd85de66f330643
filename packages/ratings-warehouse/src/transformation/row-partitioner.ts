/**
 * Row Partitioner
 *
 * Runs the per-row stages (normalize, key validation, numeric coercion,
 * CI repair) and routes each rating row to exactly one of two streams:
 *
 * - valid: normalized row tagged with its domain
 * - invalid: the ORIGINAL raw values, the domain and one reason code
 *
 * Both streams keep input order. The partition is a pure function of its
 * inputs; running it twice on the same rows yields identical output.
 */

import type { RejectionReason, SkaDomain } from '../core/constants.js';
import { UnknownDomainError } from '../core/errors.js';
import type { LookupRegistries } from '../core/registries.js';
import type {
  InvalidSkaRow,
  NormalizedSkaRow,
  RawSkaRecord,
  SkaPartition,
} from '../core/types.js';
import { repairConfidenceInterval } from './ci-repairer.js';
import { normalizeSkaFields } from './field-normalizer.js';
import { validateKeys } from './key-validator.js';
import { coerceNumericFields } from './numeric-coercer.js';

/**
 * Outcome of transforming a single rating row
 */
export type RowOutcome =
  | { readonly kind: 'valid'; readonly row: NormalizedSkaRow; readonly repaired: boolean }
  | { readonly kind: 'invalid'; readonly row: InvalidSkaRow };

/**
 * Copy the raw field values verbatim for quarantine
 */
function quarantine(
  record: RawSkaRecord,
  domain: SkaDomain,
  reason: RejectionReason
): InvalidSkaRow {
  return {
    onetsoc_code: record.onetsoc_code ?? null,
    element_id: record.element_id ?? null,
    scale_id: record.scale_id ?? null,
    data_value: record.data_value ?? null,
    n: record.n ?? null,
    standard_error: record.standard_error ?? null,
    lower_ci_bound: record.lower_ci_bound ?? null,
    upper_ci_bound: record.upper_ci_bound ?? null,
    recommend_suppress: record.recommend_suppress ?? null,
    not_relevant: record.not_relevant ?? null,
    date_updated: record.date_updated ?? null,
    domain_source: record.domain_source ?? null,
    domain,
    error_reason: reason,
  };
}

/**
 * Transform one rating row
 *
 * Reason precedence: SOC format, element, scale, then data_value.
 */
export function transformSkaRecord(
  record: RawSkaRecord,
  domain: SkaDomain,
  registries: LookupRegistries
): RowOutcome {
  const fields = normalizeSkaFields(record);

  const keys = validateKeys(fields, registries);
  if (!keys.valid) {
    return { kind: 'invalid', row: quarantine(record, domain, keys.reason) };
  }

  const numeric = coerceNumericFields(fields);
  if (!numeric.ok) {
    return { kind: 'invalid', row: quarantine(record, domain, numeric.reason) };
  }

  const interval = repairConfidenceInterval(numeric.values);

  return {
    kind: 'valid',
    repaired: interval.repaired,
    row: {
      domain,
      onetsoc_code: fields.onetsoc_code,
      element_id: fields.element_id,
      scale_id: fields.scale_id,
      data_value: numeric.values.data_value,
      n: numeric.values.n,
      standard_error: numeric.values.standard_error,
      lower_ci_bound: interval.lower_ci_bound,
      upper_ci_bound: interval.upper_ci_bound,
      recommend_suppress: fields.recommend_suppress,
      not_relevant: fields.not_relevant,
      date_updated: fields.date_updated,
      domain_source: fields.domain_source,
    },
  };
}

/**
 * Split one domain's rating rows into normalized and quarantined streams
 *
 * @throws UnknownDomainError when the domain is not in the registries
 */
export function partitionSkaRecords(
  records: readonly RawSkaRecord[],
  domain: SkaDomain,
  registries: LookupRegistries
): SkaPartition {
  if (!registries.domains.has(domain)) {
    throw new UnknownDomainError(domain, [...registries.domains]);
  }

  const valid: NormalizedSkaRow[] = [];
  const invalid: InvalidSkaRow[] = [];
  const byReason: Record<RejectionReason, number> = {
    invalid_soc_format: 0,
    missing_element_id: 0,
    invalid_scale_id: 0,
    invalid_numeric_data_value: 0,
  };
  let ciRepairs = 0;

  for (const record of records) {
    const outcome = transformSkaRecord(record, domain, registries);
    if (outcome.kind === 'valid') {
      valid.push(outcome.row);
      if (outcome.repaired) ciRepairs++;
    } else {
      invalid.push(outcome.row);
      byReason[outcome.row.error_reason]++;
    }
  }

  return {
    valid,
    invalid,
    stats: {
      domain,
      input: records.length,
      valid: valid.length,
      invalid: invalid.length,
      byReason,
      ciRepairs,
    },
  };
}
