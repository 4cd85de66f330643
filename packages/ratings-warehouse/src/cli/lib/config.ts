/**
 * Ratings Warehouse CLI Configuration Management
 *
 * Loads configuration from .ratings-warehouserc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (RATINGS_WAREHOUSE_*)
 * 3. Config file (.ratings-warehouserc or --config path)
 * 4. Default values
 *
 * Relative paths from a config file resolve against that file's directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { SUPPORTED_SCALES } from '../../core/constants.js';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    rawDir: z.string().min(1).optional(),
    database: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    majorGroups: z.string().min(1).optional(),
    scales: z
      .array(z.string().trim().min(1).transform((s) => s.toUpperCase()))
      .min(1)
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Full CLI configuration
 */
export interface WarehouseConfig {
  /** Directory holding the SQL dump files */
  readonly rawDir: string;
  /** SQLite warehouse file */
  readonly database: string;
  /** Directory for `transform` NDJSON output */
  readonly outputDir: string;
  /** Major group CSV; null means `<rawDir>/soc_major_groups.csv` */
  readonly majorGroups: string | null;
  /** Scale ids accepted by key validation */
  readonly scales: readonly string[];

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  rawDir: join('data', 'raw'),
  database: join('warehouse', 'onet.db'),
  outputDir: join('data', 'processed'),
  scales: SUPPORTED_SCALES,
} as const;

// ============================================================================
// Configuration Loading
// ============================================================================

const ENV_PREFIX = 'RATINGS_WAREHOUSE_';

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.ratings-warehouserc',
  '.ratings-warehouserc.yaml',
  '.ratings-warehouserc.yml',
  '.ratings-warehouserc.json',
] as const;

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * YAML is a superset of JSON, so one parser covers every file name.
 *
 * @throws ConfigError on syntax errors or unknown/invalid keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file: ${issues[0] ?? filePath}`, filePath, issues);
  }
  return result.data;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
  /** Environment to read overrides from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly rawDir?: string;
    readonly database?: string;
    readonly outputDir?: string;
    readonly majorGroups?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when an explicit config file is missing or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): WarehouseConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const getEnvVar = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const baseDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : resolve(baseDir, value);

  return {
    rawDir:
      options.overrides?.rawDir ??
      getEnvVar('RAW_DIR') ??
      fromFile(fileConfig.rawDir) ??
      DEFAULT_CONFIG.rawDir,
    database:
      options.overrides?.database ??
      getEnvVar('DB_PATH') ??
      fromFile(fileConfig.database) ??
      DEFAULT_CONFIG.database,
    outputDir:
      options.overrides?.outputDir ??
      getEnvVar('OUTPUT_DIR') ??
      fromFile(fileConfig.outputDir) ??
      DEFAULT_CONFIG.outputDir,
    majorGroups: options.overrides?.majorGroups ?? fromFile(fileConfig.majorGroups) ?? null,
    scales: fileConfig.scales ?? DEFAULT_CONFIG.scales,
    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}
