/**
 * Test fixture builders
 */

import { cpSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLookupRegistries, type LookupRegistries } from '../../core/registries.js';
import type { NormalizedSkaRow, RawSkaRecord } from '../../core/types.js';

/**
 * Directory with the sample SQL dumps and major group CSV
 */
export const FIXTURE_RAW_DIR = fileURLToPath(new URL('../fixtures/raw/', import.meta.url));

export const TEST_ELEMENTS = ['2.A.1.a', '2.A.1.b', '2.C.1.a'] as const;

export function makeRegistries(elements: readonly string[] = TEST_ELEMENTS): LookupRegistries {
  return createLookupRegistries({ elements });
}

/**
 * A valid raw rating row; override any field
 */
export function rawSkaRecord(overrides: Partial<Record<keyof RawSkaRecord, string | null>> = {}): RawSkaRecord {
  return {
    onetsoc_code: '11-1011.00',
    element_id: '2.A.1.a',
    scale_id: 'IM',
    data_value: '3.5',
    n: '8',
    standard_error: '0.2',
    lower_ci_bound: '3.1',
    upper_ci_bound: '3.9',
    recommend_suppress: 'N',
    not_relevant: 'N',
    date_updated: '07/01/2023',
    domain_source: 'Analyst',
    ...overrides,
  };
}

/**
 * Render a normalized row back into raw text form (numbers as text,
 * nulls as null)
 */
export function toRawSkaRecord(row: NormalizedSkaRow): RawSkaRecord {
  const text = (value: number | null): string | null => (value === null ? null : String(value));
  return {
    onetsoc_code: row.onetsoc_code,
    element_id: row.element_id,
    scale_id: row.scale_id,
    data_value: String(row.data_value),
    n: text(row.n),
    standard_error: text(row.standard_error),
    lower_ci_bound: text(row.lower_ci_bound),
    upper_ci_bound: text(row.upper_ci_bound),
    recommend_suppress: row.recommend_suppress,
    not_relevant: row.not_relevant,
    date_updated: row.date_updated,
    domain_source: row.domain_source,
  };
}

/**
 * Copy the fixture raw directory into a fresh temp directory
 *
 * @param omit - fixture files to leave out
 */
export function copyRawFixtures(omit: readonly string[] = []): string {
  const dir = mkdtempSync(join(tmpdir(), 'ratings-warehouse-raw-'));
  cpSync(FIXTURE_RAW_DIR, dir, {
    recursive: true,
    filter: (source) => !omit.some((name) => source.endsWith(name)),
  });
  return dir;
}

export function makeTempDir(prefix = 'ratings-warehouse-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
