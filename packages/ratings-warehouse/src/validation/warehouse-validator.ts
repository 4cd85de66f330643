/**
 * Warehouse Validator
 *
 * SQL-level integrity checks run against a loaded warehouse. Staging
 * checks run between the staging load and the dimension build; post-load
 * checks cover dimensions and the fact grain.
 *
 * Checks report problems as strings and never throw; callers decide
 * whether a non-empty list is fatal.
 */

import type Database from 'better-sqlite3';
import { SKA_DOMAINS, SOC_CODE_LIKE_MASK, UNAVAILABLE } from '../core/constants.js';
import { STAGING_TABLES } from '../persistence/warehouse-loader.js';

const RATING_STAGING_TABLES: readonly string[] = SKA_DOMAINS.map((d) => STAGING_TABLES[d]);

/**
 * Row count reported for one staging table
 */
export interface StagingSummaryEntry {
  readonly label: string;
  readonly value: number;
}

export interface StagingValidationResult {
  readonly errors: readonly string[];
  readonly summary: readonly StagingSummaryEntry[];
}

function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(table);
  return row !== undefined;
}

function scalar(db: Database.Database, sql: string, ...params: string[]): number {
  return db.prepare<string[], { value: number }>(sql).get(...params)?.value ?? 0;
}

/**
 * Key checks shared by the staging and post-load passes
 */
function checkRatingStagingKeys(db: Database.Database, table: string): string[] {
  const errors: string[] = [];

  const sentinelKeys = scalar(
    db,
    `SELECT COUNT(*) AS value FROM ${table}
     WHERE onetsoc_code = ? OR element_id = ? OR scale_id = ?`,
    UNAVAILABLE,
    UNAVAILABLE,
    UNAVAILABLE
  );
  if (sentinelKeys > 0) {
    errors.push(`'${table}' has '${UNAVAILABLE}' in key columns`);
  }

  const badShape = scalar(
    db,
    `SELECT COUNT(*) AS value FROM ${table} WHERE onetsoc_code NOT LIKE ?`,
    SOC_CODE_LIKE_MASK
  );
  if (badShape > 0) {
    errors.push(`'${table}' has invalid SOC format in onetsoc_code`);
  }

  return errors;
}

/**
 * Validate staging before dimensions are built
 */
export function validateStaging(db: Database.Database): StagingValidationResult {
  const errors: string[] = [];
  const summary: StagingSummaryEntry[] = [];

  for (const table of ['stg_occupation_data', ...RATING_STAGING_TABLES]) {
    if (tableExists(db, table)) {
      summary.push({
        label: `rows_${table}`,
        value: scalar(db, `SELECT COUNT(*) AS value FROM ${table}`),
      });
    }
  }

  for (const table of RATING_STAGING_TABLES) {
    if (!tableExists(db, table)) continue;
    errors.push(...checkRatingStagingKeys(db, table));
  }

  return { errors, summary };
}

/**
 * Validate dimensions, staging grain and the fact table after a load
 */
export function validatePostload(db: Database.Database): string[] {
  const errors: string[] = [];

  const duplicateCodes = scalar(
    db,
    `SELECT COUNT(*) AS value FROM (
       SELECT onetsoc_code FROM dim_occupation GROUP BY onetsoc_code HAVING COUNT(*) > 1
     )`
  );
  if (duplicateCodes > 0) {
    errors.push('Duplicate onetsoc_code in dim_occupation');
  }

  const nullRequired = scalar(
    db,
    'SELECT COUNT(*) AS value FROM dim_occupation WHERE onetsoc_code IS NULL OR title IS NULL'
  );
  if (nullRequired > 0) {
    errors.push('Null required fields in dim_occupation');
  }

  for (const table of RATING_STAGING_TABLES) {
    errors.push(...checkRatingStagingKeys(db, table));

    const duplicateGrain = scalar(
      db,
      `SELECT COUNT(*) AS value FROM (
         SELECT onetsoc_code, element_id, scale_id FROM ${table}
         GROUP BY 1, 2, 3 HAVING COUNT(*) > 1
       )`
    );
    if (duplicateGrain > 0) {
      errors.push(`Duplicate (onetsoc_code, element_id, scale_id) rows in ${table}`);
    }
  }

  const factTotal = scalar(db, 'SELECT COUNT(*) AS value FROM fact_occupation_element_rating');
  const factDistinct = scalar(
    db,
    `SELECT COUNT(*) AS value FROM (
       SELECT occupation_id, element_id, scale_id FROM fact_occupation_element_rating
       GROUP BY 1, 2, 3
     )`
  );
  if (factTotal !== factDistinct) {
    errors.push('Fact grain (occupation_id, element_id, scale_id) is not unique');
  }

  const orphanElements = scalar(
    db,
    `SELECT COUNT(*) AS value FROM fact_occupation_element_rating f
     LEFT JOIN dim_element e ON e.element_id = f.element_id
     WHERE e.element_id IS NULL`
  );
  if (orphanElements > 0) {
    errors.push('Fact has element_ids not present in dim_element');
  }

  return errors;
}
