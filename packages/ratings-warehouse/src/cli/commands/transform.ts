/**
 * Transform Command
 *
 * Extract and transform without a database, writing NDJSON:
 *
 *   occupations.ndjson
 *   <domain>.valid.ndjson
 *   <domain>.invalid.ndjson
 *
 * Usage:
 *   ratings-warehouse transform [--raw-dir <dir>] [--out <dir>]
 */

import type { Command } from 'commander';
import { join } from 'node:path';
import { SKA_DOMAINS, type SkaDomain } from '../../core/constants.js';
import { atomicWriteNdjson } from '../../core/utils/atomic-write.js';
import { transformOnly, type TransformOutput } from '../../pipeline/etl-runner.js';
import {
  EXIT_CODES,
  errorMessage,
  exitCodeForError,
  getGlobalContext,
  type CommandContext,
  type ExitCode,
} from '../lib/context.js';
import { formatJson, formatPartitionStats } from '../lib/output.js';

export interface TransformCommandOptions {
  readonly rawDir?: string;
  readonly out?: string;
}

export function registerTransformCommand(parent: Command): void {
  parent
    .command('transform')
    .description('Transform the raw dumps into NDJSON without loading a database')
    .option('--raw-dir <dir>', 'Directory with the SQL dump files')
    .option('-o, --out <dir>', 'Output directory')
    .action(async (options: TransformCommandOptions) => {
      const exitCode = await executeTransform(options, getGlobalContext());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exit(exitCode);
    });
}

/**
 * Output file names for one domain
 */
export function domainOutputFiles(domain: SkaDomain): { valid: string; invalid: string } {
  const stem = domain.toLowerCase();
  return { valid: `${stem}.valid.ndjson`, invalid: `${stem}.invalid.ndjson` };
}

/**
 * Write transform output; returns the written paths
 */
export async function writeTransformOutput(
  output: TransformOutput,
  outDir: string
): Promise<string[]> {
  const written: string[] = [];

  const occupationsPath = join(outDir, 'occupations.ndjson');
  await atomicWriteNdjson(occupationsPath, output.occupations.occupations);
  written.push(occupationsPath);

  for (const domain of SKA_DOMAINS) {
    const files = domainOutputFiles(domain);
    const partition = output.partitions[domain];

    const validPath = join(outDir, files.valid);
    await atomicWriteNdjson(validPath, partition.valid);
    written.push(validPath);

    const invalidPath = join(outDir, files.invalid);
    await atomicWriteNdjson(invalidPath, partition.invalid);
    written.push(invalidPath);
  }

  return written;
}

export async function executeTransform(
  options: TransformCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, logger } = context;
  const rawDir = options.rawDir ?? config.rawDir;
  const outDir = options.out ?? config.outputDir;

  logger.commandStart('transform', { rawDir, outDir });

  try {
    const output = transformOnly({ rawDir, scales: config.scales, logger });
    const files = await writeTransformOutput(output, outDir);

    const domains = SKA_DOMAINS.map((domain) => output.partitions[domain].stats);
    const invalid = domains.reduce((sum, s) => sum + s.invalid, 0);
    const exitCode = invalid > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;

    if (config.json) {
      console.log(
        formatJson({
          success: true,
          occupations: output.occupations.stats,
          domains,
          files,
        })
      );
    } else {
      console.log(`\nOccupations: ${output.occupations.stats.output}`);
      console.log(formatPartitionStats(domains));
      console.log(`\nWrote ${files.length} files to ${outDir}`);
    }

    logger.commandEnd(true, { exitCode });
    return exitCode;
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
}
