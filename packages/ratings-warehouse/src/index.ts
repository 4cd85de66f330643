/**
 * Ratings Warehouse
 *
 * Transform-and-validate core for occupational ratings (Skills, Knowledge,
 * Abilities) plus the extract/load pipeline around it.
 */

// Core
export * from './core/constants.js';
export * from './core/fields.js';
export * from './core/types.js';
export * from './core/errors.js';
export { isSkaDomain, isRejectionReason } from './core/type-guards.js';
export {
  createLookupRegistries,
  collectElementIds,
  type LookupRegistries,
  type LookupRegistriesInit,
} from './core/registries.js';
export { logger, createLogger, type Logger, type LogLevel } from './core/utils/logger.js';

// Transform
export * from './transformation/index.js';

// Extract
export * from './extraction/sql-dump-extractor.js';
export { parseMajorGroups, readMajorGroups, MAJOR_GROUPS_FILE, type MajorGroup } from './extraction/major-groups.js';

// Load and validate
export {
  initWarehouse,
  openWarehouse,
  readSchema,
  WarehouseLoader,
  STAGING_TABLES,
  type FactLoadResult,
  type QuarantineCount,
} from './persistence/warehouse-loader.js';
export {
  validateStaging,
  validatePostload,
  type StagingValidationResult,
  type StagingSummaryEntry,
} from './validation/warehouse-validator.js';

// Pipeline
export {
  runPipeline,
  transformOnly,
  extractSources,
  buildRegistries,
  type PipelineOptions,
  type PipelineReport,
  type TransformOptions,
  type TransformOutput,
  type ExtractedSources,
} from './pipeline/etl-runner.js';
