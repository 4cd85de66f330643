/**
 * ETL Runner
 *
 * Orchestrates one warehouse build:
 *
 *   extract → registries → transform → init DB → staging →
 *   validate staging → dimensions → fact → validate post-load
 *
 * Every run recreates the database file. Row-level data problems end up
 * in the report and in stg_invalid_ska; only missing inputs and integrity
 * violations throw.
 */

import { join } from 'node:path';
import { SKA_DOMAINS, SUPPORTED_SCALES, type SkaDomain } from '../core/constants.js';
import {
  collectElementIds,
  createLookupRegistries,
  type LookupRegistries,
} from '../core/registries.js';
import type {
  InvalidSkaRow,
  OccupationTransformResult,
  PartitionStats,
  RawOccupationRecord,
  RawSkaRecord,
  SkaPartition,
} from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { MAJOR_GROUPS_FILE, readMajorGroups } from '../extraction/major-groups.js';
import {
  extractContentModelReference,
  extractLevelScaleAnchors,
  extractOccupations,
  extractScalesReference,
  extractSkaRecords,
  type RawAnchorRecord,
  type RawContentModelRecord,
  type RawScaleReferenceRecord,
} from '../extraction/sql-dump-extractor.js';
import {
  initWarehouse,
  WarehouseLoader,
  type FactLoadResult,
  type QuarantineCount,
} from '../persistence/warehouse-loader.js';
import { transformOccupations } from '../transformation/occupation-transformer.js';
import { partitionSkaRecords } from '../transformation/row-partitioner.js';
import {
  validatePostload,
  validateStaging,
  type StagingValidationResult,
} from '../validation/warehouse-validator.js';

// ============================================================================
// Types
// ============================================================================

export interface TransformOptions {
  /** Directory holding the SQL dump files */
  readonly rawDir: string;
  /** Scale ids accepted by key validation (default IM, LV) */
  readonly scales?: readonly string[];
  readonly logger?: Logger;
}

export interface PipelineOptions extends TransformOptions {
  /** SQLite file to (re)create */
  readonly dbPath: string;
  /** Major group CSV (default `<rawDir>/soc_major_groups.csv`) */
  readonly majorGroupsPath?: string;
}

/**
 * Everything read from the raw directory
 */
export interface ExtractedSources {
  readonly occupations: readonly RawOccupationRecord[];
  readonly ratings: Readonly<Record<SkaDomain, readonly RawSkaRecord[]>>;
  readonly anchors: readonly RawAnchorRecord[];
  readonly scales: readonly RawScaleReferenceRecord[];
  readonly contentModel: readonly RawContentModelRecord[];
}

export interface TransformOutput {
  readonly sources: ExtractedSources;
  readonly registries: LookupRegistries;
  readonly occupations: OccupationTransformResult;
  readonly partitions: Readonly<Record<SkaDomain, SkaPartition>>;
}

export interface LoadCounts {
  readonly stagingOccupations: number;
  readonly stagingRatings: Readonly<Record<SkaDomain, number>>;
  readonly quarantined: number;
  readonly anchors: number;
  readonly scalesReference: number;
  readonly majorGroups: number;
  readonly dimOccupations: number;
  readonly dimScales: number;
  readonly dimElements: number;
  readonly elementScaleAnchors: number;
  readonly fact: FactLoadResult;
}

/**
 * Summary of a full pipeline run
 */
export interface PipelineReport {
  readonly dbPath: string;
  readonly extracted: {
    readonly occupations: number;
    readonly ratings: Readonly<Record<SkaDomain, number>>;
    readonly anchors: number;
    readonly scalesReference: number;
    readonly contentModel: number;
  };
  readonly occupations: OccupationTransformResult['stats'];
  readonly domains: readonly PartitionStats[];
  readonly loaded: LoadCounts;
  /** stg_invalid_ska grouped by domain and reason */
  readonly quarantine: readonly QuarantineCount[];
  readonly staging: StagingValidationResult;
  readonly postload: readonly string[];
}

// ============================================================================
// Stages
// ============================================================================

function mapDomains<T>(fn: (domain: SkaDomain) => T): Record<SkaDomain, T> {
  return {
    SKILL: fn('SKILL'),
    KNOWLEDGE: fn('KNOWLEDGE'),
    ABILITY: fn('ABILITY'),
  };
}

/**
 * Read every source from the raw directory
 *
 * @throws ExtractionError when the occupation dump is missing
 */
export function extractSources(rawDir: string): ExtractedSources {
  return {
    occupations: extractOccupations(rawDir),
    ratings: mapDomains((domain) => extractSkaRecords(rawDir, domain)),
    anchors: extractLevelScaleAnchors(rawDir),
    scales: extractScalesReference(rawDir),
    contentModel: extractContentModelReference(rawDir),
  };
}

/**
 * Build registries for a run
 *
 * The content model reference is the authoritative element list; without
 * it, every element id seen in the rating extracts is accepted.
 */
export function buildRegistries(
  sources: ExtractedSources,
  scales: readonly string[] = SUPPORTED_SCALES
): LookupRegistries {
  const fromReference = collectElementIds(sources.contentModel);
  const elements =
    fromReference.length > 0
      ? fromReference
      : collectElementIds(SKA_DOMAINS.flatMap((domain) => sources.ratings[domain]));

  return createLookupRegistries({ elements, scales });
}

/**
 * Extract and transform without touching a database
 */
export function transformOnly(options: TransformOptions): TransformOutput {
  const log = options.logger ?? defaultLogger;

  const sources = extractSources(options.rawDir);
  log.info('Extracted sources', {
    occupations: sources.occupations.length,
    skills: sources.ratings.SKILL.length,
    knowledge: sources.ratings.KNOWLEDGE.length,
    abilities: sources.ratings.ABILITY.length,
    anchors: sources.anchors.length,
    scales: sources.scales.length,
  });

  const registries = buildRegistries(sources, options.scales);
  log.debug('Built lookup registries', {
    elements: registries.elements.size,
    scales: [...registries.scales],
  });

  const occupations = transformOccupations(sources.occupations);
  const partitions = mapDomains((domain) =>
    partitionSkaRecords(sources.ratings[domain], domain, registries)
  );

  for (const domain of SKA_DOMAINS) {
    const { stats } = partitions[domain];
    if (stats.input === 0) continue;
    const message = `Partitioned ${domain} ratings`;
    const metadata = { valid: stats.valid, invalid: stats.invalid, ciRepairs: stats.ciRepairs };
    if (stats.invalid > 0) {
      log.warn(message, { ...metadata, byReason: stats.byReason });
    } else {
      log.info(message, metadata);
    }
  }

  return { sources, registries, occupations, partitions };
}

// ============================================================================
// Full Run
// ============================================================================

/**
 * Run extract, transform, load and validation into a fresh database
 *
 * @throws ExtractionError when the occupation dump is missing
 * @throws ForeignKeyViolationError when occupations reference unknown major groups
 */
export function runPipeline(options: PipelineOptions): PipelineReport {
  const log = options.logger ?? defaultLogger;
  const transformed = transformOnly(options);
  const { sources, occupations, partitions } = transformed;

  const db = initWarehouse(options.dbPath);
  try {
    const loader = new WarehouseLoader(db);

    const stagingOccupations = loader.loadStagingOccupations(occupations.occupations);
    const stagingRatings = mapDomains((domain) =>
      loader.loadStagingRatings(domain, partitions[domain].valid)
    );

    const invalid: InvalidSkaRow[] = SKA_DOMAINS.flatMap((domain) => [
      ...partitions[domain].invalid,
    ]);
    const quarantined = loader.loadInvalidRatings(invalid);
    const anchors = loader.loadStagingAnchors(sources.anchors);
    const scalesReference = loader.loadStagingScales(sources.scales);
    const dimScales = loader.loadDimScale(options.scales);

    const staging = validateStaging(db);
    for (const error of staging.errors) {
      log.warn('Staging validation failed', { error });
    }

    const majorGroupsPath = options.majorGroupsPath ?? join(options.rawDir, MAJOR_GROUPS_FILE);
    const majorGroups = loader.loadMajorGroups(readMajorGroups(majorGroupsPath));
    const dimOccupations = loader.loadDimOccupations(occupations.occupations);
    const dimElements = loader.loadDimElements();
    const elementScaleAnchors = loader.loadDimElementScaleAnchors();

    const fact = loader.loadFactRatings(
      SKA_DOMAINS.flatMap((domain) => [...partitions[domain].valid])
    );
    if (fact.unmatched > 0) {
      log.warn('Fact rows skipped without a matching occupation', { unmatched: fact.unmatched });
    }

    const quarantine = loader.quarantineCounts();
    const postload = validatePostload(db);
    for (const error of postload) {
      log.warn('Post-load validation failed', { error });
    }

    log.info('Warehouse build complete', {
      dbPath: options.dbPath,
      fact: fact.loaded,
      quarantined,
    });

    return {
      dbPath: options.dbPath,
      extracted: {
        occupations: sources.occupations.length,
        ratings: mapDomains((domain) => sources.ratings[domain].length),
        anchors: sources.anchors.length,
        scalesReference: sources.scales.length,
        contentModel: sources.contentModel.length,
      },
      occupations: occupations.stats,
      domains: SKA_DOMAINS.map((domain) => partitions[domain].stats),
      loaded: {
        stagingOccupations,
        stagingRatings,
        quarantined,
        anchors,
        scalesReference,
        majorGroups,
        dimOccupations,
        dimScales,
        dimElements,
        elementScaleAnchors,
        fact,
      },
      quarantine,
      staging,
      postload,
    };
  } finally {
    db.close();
  }
}
