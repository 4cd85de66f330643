/**
 * CLI command context and exit codes
 *
 * @module cli/lib/context
 */

import {
  ConfigError,
  ForeignKeyViolationError,
  WarehouseValidationError,
} from '../../core/errors.js';
import { loadConfig, type LoadConfigOptions, type WarehouseConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, but rows were quarantined */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to the process exit code
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof ForeignKeyViolationError || error instanceof WarehouseValidationError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

export function errorMessage(error: unknown): string {
  if (error instanceof WarehouseValidationError) return error.getSummary();
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Global Context
// ============================================================================

export interface CommandContext {
  readonly config: WarehouseConfig;
  readonly logger: CLILogger;
}

let globalContext: CommandContext | null = null;

export function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Load configuration and create the CLI logger for this invocation
 *
 * @throws ConfigError when the config file is missing or invalid
 */
export function initializeContext(options: {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}): CommandContext {
  const loadOptions: LoadConfigOptions = {
    configPath: options.config,
    overrides: { verbose: options.verbose, json: options.json },
  };
  const config = loadConfig(loadOptions);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger };
  return globalContext;
}
