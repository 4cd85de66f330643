/**
 * SQL Dump Extractor Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { copyFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ExtractionError } from '../../../core/errors.js';
import {
  extractContentModelReference,
  extractLevelScaleAnchors,
  extractOccupations,
  extractScalesReference,
  extractSkaRecords,
  stripBatchSeparators,
  toRawText,
} from '../../../extraction/sql-dump-extractor.js';
import { FIXTURE_RAW_DIR, makeTempDir, removeDir } from '../../utils/fixtures.js';

describe('stripBatchSeparators', () => {
  it('removes GO lines in any case and spacing', () => {
    expect(stripBatchSeparators('CREATE TABLE t (a);\nGO\nINSERT INTO t VALUES (1);\r\n  go  \nSELECT 1;')).toBe(
      'CREATE TABLE t (a);\nINSERT INTO t VALUES (1);\nSELECT 1;'
    );
  });

  it('keeps lines that merely contain GO', () => {
    expect(stripBatchSeparators("INSERT INTO t VALUES ('GO');")).toBe("INSERT INTO t VALUES ('GO');");
  });
});

describe('toRawText', () => {
  it('renders cells as text', () => {
    expect(toRawText(null)).toBeNull();
    expect(toRawText('IM')).toBe('IM');
    expect(toRawText(28)).toBe('28');
    expect(toRawText(4.12)).toBe('4.12');
    expect(toRawText(Buffer.from('abc'))).toBe('abc');
  });
});

describe('fixture dumps', () => {
  it('extracts occupations', () => {
    const rows = extractOccupations(FIXTURE_RAW_DIR);

    expect(rows.map((r) => r.onetsoc_code)).toEqual(['11-1011.00', '15-1252.00', '29-1141.00']);
    expect(rows[1]).toEqual({
      onetsoc_code: '15-1252.00',
      title: 'Software Developers',
      description: 'Research, design, and develop computer software.',
    });
  });

  it('extracts rating rows as text', () => {
    const rows = extractSkaRecords(FIXTURE_RAW_DIR, 'SKILL');

    expect(rows).toHaveLength(6);
    expect(rows[0]).toEqual({
      onetsoc_code: '11-1011.00',
      element_id: '2.A.1.a',
      scale_id: 'IM',
      data_value: '4.12',
      n: '28',
      standard_error: '0.12',
      lower_ci_bound: '3.88',
      upper_ci_bound: '4.37',
      recommend_suppress: 'N',
      not_relevant: null,
      date_updated: '2023-07-01',
      domain_source: 'Analyst',
    });
  });

  it('keeps non-numeric text in numeric columns', () => {
    const rows = extractSkaRecords(FIXTURE_RAW_DIR, 'KNOWLEDGE');

    expect(rows.map((r) => r.data_value)).toEqual(['4.6', 'N/A']);
  });

  it('extracts reference tables', () => {
    expect(extractContentModelReference(FIXTURE_RAW_DIR).map((r) => r.element_id)).toEqual([
      '1.A.1.a.1',
      '2.A.1.a',
      '2.A.1.b',
      '2.C.1.a',
    ]);
    expect(extractScalesReference(FIXTURE_RAW_DIR)[1]).toEqual({
      scale_id: 'LV',
      scale_name: 'Level',
      minimum: '0',
      maximum: '7',
    });
    expect(extractLevelScaleAnchors(FIXTURE_RAW_DIR)).toHaveLength(3);
  });
});

describe('missing and broken dumps', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) removeDir(dir);
    dir = null;
  });

  it('returns no rows for a missing optional dump', () => {
    dir = makeTempDir();
    copyFileSync(join(FIXTURE_RAW_DIR, '03_occupation_data.sql'), join(dir, '03_occupation_data.sql'));

    expect(extractSkaRecords(dir, 'ABILITY')).toEqual([]);
    expect(extractLevelScaleAnchors(dir)).toEqual([]);
  });

  it('throws when the occupation dump is missing', () => {
    dir = makeTempDir();
    const rawDir = dir;

    expect(() => extractOccupations(rawDir)).toThrow(ExtractionError);
    expect(() => extractOccupations(rawDir)).toThrow('Missing required file: 03_occupation_data.sql');
  });

  it('wraps SQL failures in ExtractionError', () => {
    dir = makeTempDir();
    writeFileSync(join(dir, '16_skills.sql'), 'CREATE TABLE skills (onetsoc_code TEXT);\nINSERT INTO nowhere VALUES (1);\n');

    expect(() => extractSkaRecords(dir ?? '', 'SKILL')).toThrow(ExtractionError);
  });
});
