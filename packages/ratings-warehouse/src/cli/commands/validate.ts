/**
 * Validate Command
 *
 * Re-run post-load integrity checks against an existing warehouse.
 *
 * Usage:
 *   ratings-warehouse validate [--db-path <file>]
 */

import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { WarehouseValidationError } from '../../core/errors.js';
import { openWarehouse } from '../../persistence/warehouse-loader.js';
import {
  validatePostload,
  validateStaging,
  type StagingSummaryEntry,
} from '../../validation/warehouse-validator.js';
import {
  EXIT_CODES,
  errorMessage,
  exitCodeForError,
  getGlobalContext,
  type CommandContext,
  type ExitCode,
} from '../lib/context.js';
import { formatJson, formatTable } from '../lib/output.js';

export interface ValidateOptions {
  readonly dbPath?: string;
}

export function registerValidateCommand(parent: Command): void {
  parent
    .command('validate')
    .description('Run integrity checks on an existing warehouse')
    .option('--db-path <file>', 'SQLite warehouse file')
    .action((options: ValidateOptions) => {
      const exitCode = executeValidate(options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

function checkWarehouse(dbPath: string): {
  summary: readonly StagingSummaryEntry[];
  errors: string[];
} {
  const db = openWarehouse(dbPath);
  try {
    return { summary: validateStaging(db).summary, errors: validatePostload(db) };
  } finally {
    db.close();
  }
}

export function executeValidate(options: ValidateOptions, context: CommandContext): ExitCode {
  const { config, logger } = context;
  const dbPath = options.dbPath ?? config.database;

  logger.commandStart('validate', { dbPath });

  try {
    if (!existsSync(dbPath)) {
      throw new Error(`Warehouse not found: ${dbPath}`);
    }

    const { summary, errors } = checkWarehouse(dbPath);

    if (config.json) {
      console.log(formatJson({ success: errors.length === 0, dbPath, summary, errors }));
    } else {
      console.log(
        formatTable(
          summary.map((entry) => ({ table: entry.label, rows: entry.value })),
          [
            { key: 'table', header: 'Table' },
            { key: 'rows', header: 'Rows', align: 'right' },
          ]
        )
      );
    }

    if (errors.length > 0) {
      throw new WarehouseValidationError(`${errors.length} warehouse check(s) failed`, errors);
    }

    if (!config.json) {
      console.log('\nAll warehouse checks passed');
    }
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const exitCode = exitCodeForError(error);
    if (!config.json) {
      console.error(`\n${errorMessage(error)}`);
    } else if (!(error instanceof WarehouseValidationError)) {
      console.log(formatJson({ success: false, dbPath, error: errorMessage(error) }));
    }
    logger.commandEnd(false, { exitCode });
    return exitCode;
  }
}
