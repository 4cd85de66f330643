/**
 * Warehouse Validator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { initWarehouse } from '../../../persistence/warehouse-loader.js';
import { validatePostload, validateStaging } from '../../../validation/warehouse-validator.js';

function insertRating(db: Database.Database, table: string, code: string, element = '2.A.1.a'): void {
  db.prepare(
    `INSERT INTO ${table} (onetsoc_code, element_id, scale_id, data_value, recommend_suppress,
       not_relevant, date_updated, domain_source)
     VALUES (?, ?, 'IM', 3.5, 'N', 'unavailable', '2023-07-01', 'Analyst')`
  ).run(code, element);
}

describe('validateStaging', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = initWarehouse(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('summarizes row counts for every staging table', () => {
    insertRating(db, 'stg_skills', '11-1011.00');

    expect(validateStaging(db)).toEqual({
      errors: [],
      summary: [
        { label: 'rows_stg_occupation_data', value: 0 },
        { label: 'rows_stg_skills', value: 1 },
        { label: 'rows_stg_knowledge', value: 0 },
        { label: 'rows_stg_abilities', value: 0 },
      ],
    });
  });

  it('flags the sentinel in key columns', () => {
    insertRating(db, 'stg_skills', 'unavailable');

    expect(validateStaging(db).errors).toEqual([
      "'stg_skills' has 'unavailable' in key columns",
      "'stg_skills' has invalid SOC format in onetsoc_code",
    ]);
  });

  it('flags codes that do not have the SOC shape', () => {
    insertRating(db, 'stg_knowledge', '11-1011');

    expect(validateStaging(db).errors).toEqual([
      "'stg_knowledge' has invalid SOC format in onetsoc_code",
    ]);
  });
});

describe('validatePostload', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = initWarehouse(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('passes an empty warehouse', () => {
    expect(validatePostload(db)).toEqual([]);
  });

  it('flags duplicate staging grain', () => {
    insertRating(db, 'stg_abilities', '29-1141.00');
    insertRating(db, 'stg_abilities', '29-1141.00');

    expect(validatePostload(db)).toEqual([
      'Duplicate (onetsoc_code, element_id, scale_id) rows in stg_abilities',
    ]);
  });

  it('flags fact rows whose element is not in dim_element', () => {
    db.pragma('foreign_keys = OFF');
    db.exec(`
      INSERT INTO fact_occupation_element_rating (occupation_id, element_id, scale_id, data_value)
      VALUES (1, '9.Z.9.z', 'IM', 2.0)
    `);

    expect(validatePostload(db)).toEqual(['Fact has element_ids not present in dim_element']);
  });
});
