/**
 * CLI Command Tests
 *
 * Commands run against the fixture dumps with stdout captured.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError, ExtractionError, ForeignKeyViolationError, WarehouseValidationError } from '../../../core/errors.js';
import { executeRun } from '../../../cli/commands/run.js';
import { executeTransform } from '../../../cli/commands/transform.js';
import { executeValidate } from '../../../cli/commands/validate.js';
import type { WarehouseConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES, exitCodeForError, type CommandContext } from '../../../cli/lib/context.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { FIXTURE_RAW_DIR, makeTempDir, removeDir } from '../../utils/fixtures.js';

function makeContext(dir: string, json = true): CommandContext {
  const config: WarehouseConfig = {
    rawDir: FIXTURE_RAW_DIR,
    database: join(dir, 'onet.db'),
    outputDir: join(dir, 'processed'),
    majorGroups: null,
    scales: ['IM', 'LV'],
    verbose: false,
    json,
    configPath: null,
  };
  return { config, logger: createCLILogger({ level: 'error', json: true }) };
}

function printed(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
}

function lastJson(): unknown {
  return JSON.parse(printed().at(-1) ?? 'null');
}

describe('exitCodeForError', () => {
  it('maps errors to exit codes', () => {
    expect(exitCodeForError(new ConfigError('bad', null))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeForError(new ForeignKeyViolationError('dim_occupation', 'major_group_code', ['11']))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeForError(new WarehouseValidationError('failed', ['x']))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeForError(new ExtractionError('missing', '/raw'))).toBe(EXIT_CODES.ERRORS);
  });
});

describe('warehouse commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('ratings-warehouse-cli-');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(dir);
  });

  it('run exits with warnings when rows were quarantined', () => {
    const code = executeRun({}, makeContext(dir));

    expect(code).toBe(EXIT_CODES.WARNINGS);
    expect(lastJson()).toMatchObject({
      success: true,
      report: { loaded: { quarantined: 4, fact: { loaded: 5, unmatched: 1 } } },
    });
  });

  it('run lists quarantined rows by domain and reason in human mode', () => {
    const code = executeRun({}, makeContext(dir, false));

    expect(code).toBe(EXIT_CODES.WARNINGS);
    const lines = printed();
    const start = lines.indexOf('Quarantined: 4');
    expect(lines.slice(start + 1, start + 5)).toEqual([
      '  KNOWLEDGE invalid_numeric_data_value 1',
      '  SKILL     invalid_scale_id           1',
      '  SKILL     invalid_soc_format         1',
      '  SKILL     missing_element_id         1',
    ]);
  });

  it('run reports extraction failures as errors', () => {
    const code = executeRun({ rawDir: join(dir, 'empty') }, makeContext(dir));

    expect(code).toBe(EXIT_CODES.ERRORS);
    expect(lastJson()).toEqual({
      success: false,
      error: 'Missing required file: 03_occupation_data.sql',
    });
  });

  it('run exits with a data integrity error when major groups are missing', () => {
    const code = executeRun({ majorGroups: join(dir, 'none.csv') }, makeContext(dir));

    expect(code).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
  });

  it('validate passes on a freshly built warehouse', () => {
    const context = makeContext(dir);
    executeRun({}, context);

    expect(executeValidate({}, context)).toBe(EXIT_CODES.SUCCESS);
    expect(lastJson()).toMatchObject({ success: true, errors: [] });
  });

  it('validate fails when the warehouse does not exist', () => {
    expect(executeValidate({ dbPath: join(dir, 'missing.db') }, makeContext(dir))).toBe(EXIT_CODES.ERRORS);
  });

  it('transform writes one NDJSON file per stream', async () => {
    const context = makeContext(dir);
    const code = await executeTransform({}, context);

    expect(code).toBe(EXIT_CODES.WARNINGS);

    const out = context.config.outputDir;
    const lines = (name: string): string[] =>
      readFileSync(join(out, name), 'utf-8').split('\n').filter((line) => line.length > 0);

    expect(lines('occupations.ndjson')).toHaveLength(3);
    expect(lines('skill.valid.ndjson')).toHaveLength(3);
    expect(lines('skill.invalid.ndjson')).toHaveLength(3);
    expect(lines('knowledge.invalid.ndjson')).toHaveLength(1);
    expect(readFileSync(join(out, 'ability.invalid.ndjson'), 'utf-8')).toBe('');

    expect(JSON.parse(lines('knowledge.invalid.ndjson')[0] ?? '{}')).toMatchObject({
      onetsoc_code: '29-1141.00',
      data_value: 'N/A',
      domain: 'KNOWLEDGE',
      error_reason: 'invalid_numeric_data_value',
    });
  });

  it('transform prints a stats table in human mode', async () => {
    await executeTransform({}, makeContext(dir, false));

    expect(printed()).toContain(`\nWrote 7 files to ${join(dir, 'processed')}`);
  });
});
