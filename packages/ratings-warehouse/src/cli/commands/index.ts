/**
 * Registers the warehouse subcommands:
 * - run: full extract, transform, load and validate
 * - transform: NDJSON output without a database
 * - validate: integrity checks on an existing warehouse
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerTransformCommand } from './transform.js';
import { registerValidateCommand } from './validate.js';

export function registerWarehouseCommands(program: Command): void {
  registerRunCommand(program);
  registerTransformCommand(program);
  registerValidateCommand(program);
}
