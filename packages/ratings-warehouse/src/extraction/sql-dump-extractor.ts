/**
 * SQL Dump Extractor
 *
 * Reads the occupational database's SQL dump files by executing each one
 * in a throwaway in-memory SQLite database and selecting the columns the
 * pipeline needs. SQL Server `GO` batch separators are stripped first.
 *
 * Cell values are handed on as text (NULL stays null); typing is the
 * transform layer's job.
 */

import Database from 'better-sqlite3';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { SkaDomain } from '../core/constants.js';
import { ExtractionError } from '../core/errors.js';
import {
  SKA_FIELDS,
  type RawOccupationRecord,
  type RawSkaRecord,
  type RawText,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'extractor' });

// ============================================================================
// Source Catalog
// ============================================================================

/**
 * Dump file and table for each extract
 */
export const DUMP_SOURCES = {
  occupation: { file: '03_occupation_data.sql', table: 'occupation_data' },
  skills: { file: '16_skills.sql', table: 'skills' },
  knowledge: { file: '15_knowledge.sql', table: 'knowledge' },
  abilities: { file: '11_abilities.sql', table: 'abilities' },
  level_scale_anchors: { file: '06_level_scale_anchors.sql', table: 'level_scale_anchors' },
  scales_reference: { file: '04_scales_reference.sql', table: 'scales_reference' },
  content_model_reference: {
    file: '01_content_model_reference.sql',
    table: 'content_model_reference',
  },
} as const;

export type DumpSource = keyof typeof DUMP_SOURCES;

/**
 * Rating extract for each domain
 */
export const DOMAIN_SOURCES: Readonly<Record<SkaDomain, DumpSource>> = {
  SKILL: 'skills',
  KNOWLEDGE: 'knowledge',
  ABILITY: 'abilities',
};

// ============================================================================
// Reference Record Types
// ============================================================================

type RawRow<C extends string> = { readonly [K in C]?: RawText };

export type RawAnchorRecord = RawRow<
  'element_id' | 'scale_id' | 'anchor_value' | 'anchor_description'
>;

export type RawScaleReferenceRecord = RawRow<'scale_id' | 'scale_name' | 'minimum' | 'maximum'>;

export type RawContentModelRecord = RawRow<'element_id' | 'element_name'>;

// ============================================================================
// Dump Execution
// ============================================================================

/**
 * Drop SQL Server `GO` batch separators so SQLite can run the script
 */
export function stripBatchSeparators(sql: string): string {
  return sql
    .split(/\r?\n/)
    .filter((line) => line.trim().toUpperCase() !== 'GO')
    .join('\n');
}

/**
 * Render a SQLite cell as extracted text
 */
export function toRawText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

function dumpPath(rawDir: string, source: DumpSource): string {
  return join(rawDir, DUMP_SOURCES[source].file);
}

/**
 * Execute a dump file in memory and select the given columns
 */
function selectFromDump<C extends string>(
  path: string,
  table: string,
  columns: readonly C[]
): RawRow<C>[] {
  let script: string;
  try {
    script = stripBatchSeparators(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ExtractionError(`Cannot read dump file: ${path}`, path, error);
  }

  const db = new Database(':memory:');
  try {
    db.exec(script);
    const rows = db
      .prepare<[], Record<string, unknown>>(`SELECT ${columns.join(', ')} FROM ${table}`)
      .all();

    return rows.map((row) => {
      const record: { [K in C]?: RawText } = {};
      for (const column of columns) {
        record[column] = toRawText(row[column]);
      }
      return record;
    });
  } catch (error) {
    throw new ExtractionError(
      `Failed to execute dump ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      error
    );
  } finally {
    db.close();
  }
}

/**
 * Select from an optional dump; a missing file yields no rows
 */
function selectOptional<C extends string>(
  rawDir: string,
  source: DumpSource,
  columns: readonly C[]
): RawRow<C>[] {
  const path = dumpPath(rawDir, source);
  if (!existsSync(path)) {
    log.debug('Optional dump not found', { source, path });
    return [];
  }
  return selectFromDump(path, DUMP_SOURCES[source].table, columns);
}

// ============================================================================
// Public Extractors
// ============================================================================

/**
 * Extract occupation master rows (required)
 *
 * @throws ExtractionError when the occupation dump is missing or invalid
 */
export function extractOccupations(rawDir: string): RawOccupationRecord[] {
  const path = dumpPath(rawDir, 'occupation');
  if (!existsSync(path)) {
    throw new ExtractionError(
      `Missing required file: ${DUMP_SOURCES.occupation.file}`,
      path
    );
  }
  return selectFromDump(path, DUMP_SOURCES.occupation.table, [
    'onetsoc_code',
    'title',
    'description',
  ]);
}

/**
 * Extract one domain's rating rows (optional)
 */
export function extractSkaRecords(rawDir: string, domain: SkaDomain): RawSkaRecord[] {
  return selectOptional(rawDir, DOMAIN_SOURCES[domain], SKA_FIELDS);
}

export function extractLevelScaleAnchors(rawDir: string): RawAnchorRecord[] {
  return selectOptional(rawDir, 'level_scale_anchors', [
    'element_id',
    'scale_id',
    'anchor_value',
    'anchor_description',
  ]);
}

export function extractScalesReference(rawDir: string): RawScaleReferenceRecord[] {
  return selectOptional(rawDir, 'scales_reference', [
    'scale_id',
    'scale_name',
    'minimum',
    'maximum',
  ]);
}

/**
 * Extract the content model reference, the authoritative element list
 */
export function extractContentModelReference(rawDir: string): RawContentModelRecord[] {
  return selectOptional(rawDir, 'content_model_reference', ['element_id', 'element_name']);
}
