#!/usr/bin/env tsx
/**
 * Ratings Warehouse CLI Entry Point
 *
 * @module ratings-warehouse-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerWarehouseCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES, errorMessage, initializeContext } from '../src/cli/lib/context.js';

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
  try {
    const result = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return result.success ? result.data.version : '0.0.0';
  } catch (error) {
    console.error(`Cannot read package version: ${errorMessage(error)}`);
    return '0.0.0';
  }
}

type GlobalOptions = {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
};

function createProgram(): Command {
  const program = new Command();

  program
    .name('ratings-warehouse')
    .description('Occupational ratings ETL: SQL dumps to a validated SQLite star schema')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .ratings-warehouserc)')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerWarehouseCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
