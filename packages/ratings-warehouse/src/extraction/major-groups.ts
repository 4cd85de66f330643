/**
 * SOC major group lookup (soc_major_groups.csv)
 *
 * CSV columns: `code_full,name`, e.g. `11-0000,Management Occupations`.
 * The 2-digit prefix becomes the dimension key.
 */

import { existsSync, readFileSync } from 'node:fs';
import Papa from 'papaparse';
import { ExtractionError } from '../core/errors.js';

export const MAJOR_GROUPS_FILE = 'soc_major_groups.csv';

export interface MajorGroup {
  readonly major_group_code: string;
  readonly code_full: string;
  readonly name: string;
}

/**
 * Parse major group CSV text
 *
 * Rows with a code shorter than two characters or no name are skipped.
 */
export function parseMajorGroups(csv: string): MajorGroup[] {
  const result = Papa.parse<Record<string, string | undefined>>(csv, {
    header: true,
    skipEmptyLines: true,
  });

  const groups: MajorGroup[] = [];
  for (const row of result.data) {
    const full = (row.code_full ?? '').trim();
    const name = (row.name ?? '').trim();
    if (full.length >= 2 && name) {
      groups.push({ major_group_code: full.slice(0, 2), code_full: full, name });
    }
  }
  return groups;
}

/**
 * Read the major group CSV; a missing file yields no groups
 */
export function readMajorGroups(csvPath: string): MajorGroup[] {
  if (!existsSync(csvPath)) {
    return [];
  }
  try {
    return parseMajorGroups(readFileSync(csvPath, 'utf-8'));
  } catch (error) {
    throw new ExtractionError(`Cannot read major groups: ${csvPath}`, csvPath, error);
  }
}
