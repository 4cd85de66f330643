/**
 * SQLite Warehouse Loader
 *
 * Persists transform output into the star schema:
 *
 *   staging (stg_*) → dimensions (dim_*) → fact_occupation_element_rating
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3 with prepared statements
 * - One transaction per load step; a failed step rolls back whole
 * - Foreign keys enforced; occupation → major group is pre-checked so the
 *   failure names the offending codes
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { SUPPORTED_SCALES, type RejectionReason, type SkaDomain } from '../core/constants.js';
import { ForeignKeyViolationError } from '../core/errors.js';
import { isUnavailable } from '../core/fields.js';
import { isRejectionReason, isSkaDomain } from '../core/type-guards.js';
import type {
  InvalidSkaRow,
  NormalizedOccupation,
  NormalizedSkaRow,
} from '../core/types.js';
import type { MajorGroup } from '../extraction/major-groups.js';
import type {
  RawAnchorRecord,
  RawScaleReferenceRecord,
} from '../extraction/sql-dump-extractor.js';
import { toFactRating } from '../transformation/fact-rating.js';
import { normalizeSpace } from '../transformation/field-normalizer.js';
import { parseDecimal } from '../transformation/numeric-coercer.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * Staging table for each rating domain
 */
export const STAGING_TABLES: Readonly<Record<SkaDomain, string>> = {
  SKILL: 'stg_skills',
  KNOWLEDGE: 'stg_knowledge',
  ABILITY: 'stg_abilities',
};

/**
 * Read the bundled star schema
 */
export function readSchema(): string {
  return readFileSync(fileURLToPath(new URL('./schema.sql', import.meta.url)), 'utf-8');
}

/**
 * Create a fresh warehouse database
 *
 * An existing file at `dbPath` is removed first so schema changes always
 * apply cleanly. Pass `':memory:'` for an in-process database.
 */
export function initWarehouse(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
    for (const suffix of ['', '-wal', '-shm']) {
      if (existsSync(dbPath + suffix)) {
        rmSync(dbPath + suffix);
      }
    }
  }

  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');
  db.exec(readSchema());
  return db;
}

/**
 * Open an existing warehouse read-only
 */
export function openWarehouse(dbPath: string): Database.Database {
  return new Database(dbPath, { readonly: true, fileMustExist: true });
}

// ============================================================================
// Load Results
// ============================================================================

/**
 * Outcome of loading fact rows
 */
export interface QuarantineCount {
  readonly domain: SkaDomain;
  readonly reason: RejectionReason;
  readonly count: number;
}

export interface FactLoadResult {
  /** Rows inserted or updated */
  readonly loaded: number;
  /** Rows whose occupation is not in dim_occupation */
  readonly unmatched: number;
}

// ============================================================================
// Loader
// ============================================================================

export class WarehouseLoader {
  constructor(private readonly db: Database.Database) {}

  // ==========================================================================
  // Staging
  // ==========================================================================

  /**
   * Truncate and load occupation staging
   */
  loadStagingOccupations(rows: readonly NormalizedOccupation[]): number {
    const insert = this.db.prepare(`
      INSERT INTO stg_occupation_data (onetsoc_code, title, description)
      VALUES (@onetsoc_code, @title, @description)
    `);

    this.db.transaction(() => {
      this.db.exec('DELETE FROM stg_occupation_data');
      for (const row of rows) {
        insert.run({
          onetsoc_code: row.onetsoc_code,
          title: row.title,
          description: row.description,
        });
      }
    })();

    return rows.length;
  }

  /**
   * Truncate and load one domain's normalized rating rows
   */
  loadStagingRatings(domain: SkaDomain, rows: readonly NormalizedSkaRow[]): number {
    const table = STAGING_TABLES[domain];
    const insert = this.db.prepare(`
      INSERT INTO ${table} (
        onetsoc_code, element_id, scale_id, data_value, n, standard_error,
        lower_ci_bound, upper_ci_bound, recommend_suppress, not_relevant,
        date_updated, domain_source
      ) VALUES (
        @onetsoc_code, @element_id, @scale_id, @data_value, @n, @standard_error,
        @lower_ci_bound, @upper_ci_bound, @recommend_suppress, @not_relevant,
        @date_updated, @domain_source
      )
    `);

    this.db.transaction(() => {
      this.db.exec(`DELETE FROM ${table}`);
      for (const row of rows) {
        insert.run({
          onetsoc_code: row.onetsoc_code,
          element_id: row.element_id,
          scale_id: row.scale_id,
          data_value: row.data_value,
          n: row.n,
          standard_error: row.standard_error,
          lower_ci_bound: row.lower_ci_bound,
          upper_ci_bound: row.upper_ci_bound,
          recommend_suppress: row.recommend_suppress,
          not_relevant: row.not_relevant,
          date_updated: row.date_updated,
          domain_source: row.domain_source,
        });
      }
    })();

    return rows.length;
  }

  /**
   * Truncate and load quarantined rating rows
   */
  loadInvalidRatings(rows: readonly InvalidSkaRow[]): number {
    const insert = this.db.prepare(`
      INSERT INTO stg_invalid_ska (
        domain, onetsoc_code, element_id, scale_id, data_value, n, standard_error,
        lower_ci_bound, upper_ci_bound, recommend_suppress, not_relevant,
        date_updated, domain_source, error_reason
      ) VALUES (
        @domain, @onetsoc_code, @element_id, @scale_id, @data_value, @n, @standard_error,
        @lower_ci_bound, @upper_ci_bound, @recommend_suppress, @not_relevant,
        @date_updated, @domain_source, @error_reason
      )
    `);

    this.db.transaction(() => {
      this.db.exec('DELETE FROM stg_invalid_ska');
      for (const row of rows) {
        insert.run({ ...row });
      }
    })();

    return rows.length;
  }

  /**
   * Truncate and load level scale anchors
   *
   * Anchors without element, scale, numeric value or description cannot
   * satisfy the staging columns and are not loaded.
   */
  loadStagingAnchors(records: readonly RawAnchorRecord[]): number {
    const insert = this.db.prepare(`
      INSERT INTO stg_level_scale_anchors (element_id, scale_id, anchor_value, anchor_description)
      VALUES (?, ?, ?, ?)
    `);

    let loaded = 0;
    this.db.transaction(() => {
      this.db.exec('DELETE FROM stg_level_scale_anchors');
      for (const record of records) {
        const elementId = normalizeSpace(record.element_id);
        const scaleId = normalizeSpace(record.scale_id).toUpperCase();
        const value = parseDecimal(normalizeSpace(record.anchor_value));
        const description = normalizeSpace(record.anchor_description);
        if (!elementId || !scaleId || value === null || !description) continue;

        insert.run(elementId, scaleId, Math.trunc(value), description);
        loaded++;
      }
    })();

    return loaded;
  }

  /**
   * Truncate and load the scales reference
   */
  loadStagingScales(records: readonly RawScaleReferenceRecord[]): number {
    const insert = this.db.prepare(`
      INSERT INTO stg_scales_reference (scale_id, scale_name, minimum, maximum)
      VALUES (?, ?, ?, ?)
    `);

    let loaded = 0;
    this.db.transaction(() => {
      this.db.exec('DELETE FROM stg_scales_reference');
      for (const record of records) {
        const scaleId = normalizeSpace(record.scale_id).toUpperCase();
        const name = normalizeSpace(record.scale_name);
        const minimum = parseDecimal(normalizeSpace(record.minimum));
        const maximum = parseDecimal(normalizeSpace(record.maximum));
        if (!scaleId || !name || minimum === null || maximum === null) continue;

        insert.run(scaleId, name, minimum, maximum);
        loaded++;
      }
    })();

    return loaded;
  }

  // ==========================================================================
  // Dimensions
  // ==========================================================================

  /**
   * Upsert SOC major groups
   */
  loadMajorGroups(groups: readonly MajorGroup[]): number {
    const upsert = this.db.prepare(`
      INSERT INTO dim_major_group (major_group_code, code_full, name)
      VALUES (@major_group_code, @code_full, @name)
      ON CONFLICT(major_group_code) DO UPDATE SET
        code_full = excluded.code_full,
        name = excluded.name
    `);

    this.db.transaction(() => {
      for (const group of groups) {
        upsert.run({ ...group });
      }
    })();

    return groups.length;
  }

  /**
   * Upsert occupations by onetsoc_code
   *
   * @throws ForeignKeyViolationError when a major group is not loaded
   */
  loadDimOccupations(rows: readonly NormalizedOccupation[]): number {
    const known = new Set(
      this.db
        .prepare<[], { major_group_code: string }>('SELECT major_group_code FROM dim_major_group')
        .all()
        .map((r) => r.major_group_code)
    );

    const missing = new Set<string>();
    for (const row of rows) {
      if (!known.has(row.major_group_code)) {
        missing.add(row.major_group_code);
      }
    }
    if (missing.size > 0) {
      throw new ForeignKeyViolationError(
        'dim_occupation',
        'major_group_code',
        [...missing].sort()
      );
    }

    const upsert = this.db.prepare(`
      INSERT INTO dim_occupation (onetsoc_code, title, description, major_group_code)
      VALUES (@onetsoc_code, @title, @description, @major_group_code)
      ON CONFLICT(onetsoc_code) DO UPDATE SET
        title = excluded.title,
        description = excluded.description,
        major_group_code = excluded.major_group_code
    `);

    this.db.transaction(() => {
      for (const row of rows) {
        upsert.run({
          onetsoc_code: row.onetsoc_code,
          title: row.title,
          description: isUnavailable(row.description) ? null : row.description,
          major_group_code: row.major_group_code,
        });
      }
    })();

    return rows.length;
  }

  /**
   * Rebuild dim_scale from the scales reference, restricted to the given
   * scales; every supported scale gets a row even without reference data
   */
  loadDimScale(scales: readonly string[] = SUPPORTED_SCALES): number {
    const placeholders = scales.map(() => '?').join(', ');

    this.db.transaction(() => {
      this.db.exec('DELETE FROM dim_scale');
      if (scales.length === 0) return;

      this.db
        .prepare(`
          INSERT INTO dim_scale (scale_id, name, min_value, max_value, step)
          SELECT scale_id, MIN(scale_name), MIN(minimum), MAX(maximum), NULL
          FROM stg_scales_reference
          WHERE scale_id IN (${placeholders})
          GROUP BY scale_id
        `)
        .run(...scales);

      const ensure = this.db.prepare('INSERT OR IGNORE INTO dim_scale (scale_id) VALUES (?)');
      for (const scale of scales) {
        ensure.run(scale);
      }
    })();

    return this.count('dim_scale');
  }

  /**
   * Upsert dim_element from the distinct element ids in rating staging
   *
   * @returns number of distinct (element, domain) pairs observed
   */
  loadDimElements(): number {
    const distinct = `
      SELECT DISTINCT element_id, 'SKILL' AS domain FROM stg_skills
      UNION
      SELECT DISTINCT element_id, 'KNOWLEDGE' FROM stg_knowledge
      UNION
      SELECT DISTINCT element_id, 'ABILITY' FROM stg_abilities
    `;

    const total =
      this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM (${distinct})`).get()
        ?.total ?? 0;

    this.db.exec(`
      INSERT OR REPLACE INTO dim_element (element_id, domain)
      SELECT element_id, domain FROM (${distinct})
    `);

    return total;
  }

  /**
   * Upsert anchors for known elements and scales into dim_element_scale
   *
   * @returns number of staging anchors considered
   */
  loadDimElementScaleAnchors(): number {
    const total = this.count('stg_level_scale_anchors');

    this.db.exec(`
      INSERT INTO dim_element_scale (element_id, scale_id, anchor_value, anchor_description)
      SELECT a.element_id, a.scale_id, a.anchor_value, a.anchor_description
      FROM stg_level_scale_anchors a
      JOIN dim_element e ON e.element_id = a.element_id
      JOIN dim_scale s   ON s.scale_id   = a.scale_id
      WHERE true
      ON CONFLICT(element_id, scale_id, anchor_value) DO UPDATE SET
        anchor_description = excluded.anchor_description
    `);

    return total;
  }

  // ==========================================================================
  // Fact
  // ==========================================================================

  /**
   * Upsert fact rows from normalized rating rows
   *
   * Staging sentinels become NULL. Rows whose occupation is not in
   * dim_occupation are counted as unmatched and skipped.
   */
  loadFactRatings(rows: readonly NormalizedSkaRow[]): FactLoadResult {
    const upsert = this.db.prepare(`
      INSERT INTO fact_occupation_element_rating (
        occupation_id, element_id, scale_id, data_value, n, standard_error,
        lower_ci_bound, upper_ci_bound, recommend_suppress, not_relevant,
        date_updated, domain_source
      )
      SELECT d.occupation_id, @element_id, @scale_id, @data_value, @n, @standard_error,
             @lower_ci_bound, @upper_ci_bound, @recommend_suppress, @not_relevant,
             @date_updated, @domain_source
      FROM dim_occupation d
      WHERE d.onetsoc_code = @onetsoc_code
      ON CONFLICT(occupation_id, element_id, scale_id) DO UPDATE SET
        data_value = excluded.data_value,
        n = excluded.n,
        standard_error = excluded.standard_error,
        lower_ci_bound = excluded.lower_ci_bound,
        upper_ci_bound = excluded.upper_ci_bound,
        recommend_suppress = excluded.recommend_suppress,
        not_relevant = excluded.not_relevant,
        date_updated = excluded.date_updated,
        domain_source = excluded.domain_source
    `);

    let loaded = 0;
    let unmatched = 0;

    this.db.transaction(() => {
      for (const row of rows) {
        const result = upsert.run({ ...toFactRating(row) });
        if (result.changes > 0) {
          loaded++;
        } else {
          unmatched++;
        }
      }
    })();

    return { loaded, unmatched };
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Quarantined row counts by domain and reason
   */
  quarantineCounts(): QuarantineCount[] {
    return this.db
      .prepare<[], { domain: string; error_reason: string; count: number }>(`
        SELECT domain, error_reason, COUNT(*) AS count
        FROM stg_invalid_ska
        GROUP BY domain, error_reason
        ORDER BY domain, error_reason
      `)
      .all()
      .flatMap((row) =>
        isSkaDomain(row.domain) && isRejectionReason(row.error_reason)
          ? [{ domain: row.domain, reason: row.error_reason, count: row.count }]
          : []
      );
  }

  private count(table: string): number {
    return (
      this.db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get()
        ?.total ?? 0
    );
  }
}
