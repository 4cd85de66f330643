/**
 * Transformation Layer
 *
 * raw records → FieldNormalizer → KeyValidator + NumericCoercer +
 * ConfidenceIntervalRepairer → RowPartitioner → (valid, invalid)
 */

export {
  normalizeSpace,
  normalizeFlag,
  normalizeDate,
  normalizeOccupationFields,
  normalizeSkaFields,
  type CleanSkaFields,
  type CleanOccupationFields,
} from './field-normalizer.js';
export { validateKeys, isValidSocCode, type RatingKeys, type KeyValidationResult } from './key-validator.js';
export { parseDecimal, coerceNumericFields, type NumericCoercionResult } from './numeric-coercer.js';
export { repairConfidenceInterval, type ConfidenceInterval } from './ci-repairer.js';
export { transformSkaRecord, partitionSkaRecords, type RowOutcome } from './row-partitioner.js';
export { transformOccupations, deriveMajorGroupCode } from './occupation-transformer.js';
export { toFactRating } from './fact-rating.js';
