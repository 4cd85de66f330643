/**
 * Run Command
 *
 * Full build: extract the raw dumps, transform, load a fresh SQLite
 * warehouse and validate it.
 *
 * Usage:
 *   ratings-warehouse run [options]
 *
 * Options:
 *   --raw-dir <dir>        Directory with the SQL dump files
 *   --db-path <file>       Warehouse file to (re)create
 *   --major-groups <csv>   Major group CSV (default: <raw-dir>/soc_major_groups.csv)
 *
 * Exit codes: 0 clean, 1 rows quarantined, 5 post-load checks failed
 */

import type { Command } from 'commander';
import { runPipeline, type PipelineReport } from '../../pipeline/etl-runner.js';
import {
  EXIT_CODES,
  errorMessage,
  exitCodeForError,
  getGlobalContext,
  type CommandContext,
  type ExitCode,
} from '../lib/context.js';
import { formatJson, formatPartitionStats } from '../lib/output.js';

export interface RunOptions {
  readonly rawDir?: string;
  readonly dbPath?: string;
  readonly majorGroups?: string;
}

export function registerRunCommand(parent: Command): void {
  parent
    .command('run')
    .description('Extract, transform and load the ratings warehouse')
    .option('--raw-dir <dir>', 'Directory with the SQL dump files')
    .option('--db-path <file>', 'SQLite warehouse file to (re)create')
    .option('--major-groups <csv>', 'SOC major group CSV')
    .action((options: RunOptions) => {
      const exitCode = executeRun(options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

/**
 * Exit code for a finished run
 */
export function runExitCode(report: PipelineReport): ExitCode {
  if (report.postload.length > 0) return EXIT_CODES.DATA_INTEGRITY_ERROR;
  if (report.loaded.quarantined > 0) return EXIT_CODES.WARNINGS;
  return EXIT_CODES.SUCCESS;
}

export function executeRun(options: RunOptions, context: CommandContext): ExitCode {
  const { config, logger } = context;
  const rawDir = options.rawDir ?? config.rawDir;
  const dbPath = options.dbPath ?? config.database;
  const majorGroupsPath = options.majorGroups ?? config.majorGroups ?? undefined;

  logger.commandStart('run', { rawDir, dbPath });

  let report: PipelineReport;
  try {
    report = runPipeline({
      rawDir,
      dbPath,
      majorGroupsPath,
      scales: config.scales,
      logger,
    });
  } catch (error) {
    const exitCode = exitCodeForError(error);
    if (config.json) {
      console.log(formatJson({ success: false, error: errorMessage(error) }));
    } else {
      console.error(`\nError: ${errorMessage(error)}`);
    }
    logger.commandEnd(false, { exitCode });
    return exitCode;
  }

  const exitCode = runExitCode(report);

  if (config.json) {
    console.log(formatJson({ success: exitCode !== EXIT_CODES.DATA_INTEGRITY_ERROR, report }));
  } else {
    console.log('\nRatings Warehouse Build');
    console.log('='.repeat(50));
    console.log(`Database: ${report.dbPath}`);
    console.log(
      `Occupations: ${report.occupations.output} loaded ` +
        `(${report.occupations.duplicates} duplicate, ${report.occupations.skippedIncomplete} incomplete)`
    );
    console.log('');
    console.log(formatPartitionStats(report.domains));
    console.log('');
    console.log(
      `Fact rows: ${report.loaded.fact.loaded} loaded, ${report.loaded.fact.unmatched} unmatched`
    );
    console.log(`Quarantined: ${report.loaded.quarantined}`);
    for (const { domain, reason, count } of report.quarantine) {
      console.log(`  ${domain.padEnd(9)} ${reason.padEnd(26)} ${count}`);
    }

    if (report.postload.length > 0) {
      console.log('\nPost-load validation errors:');
      for (const error of report.postload) {
        console.log(`  - ${error}`);
      }
    }
  }

  logger.commandEnd(exitCode !== EXIT_CODES.DATA_INTEGRITY_ERROR, { exitCode });
  return exitCode;
}
