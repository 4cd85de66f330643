/**
 * Ratings Warehouse Error Types
 *
 * Data-quality problems in individual rows are never thrown: they become
 * quarantine entries. The classes below cover the failures that stop a
 * run: caller misuse, missing inputs, bad configuration and load-time
 * integrity violations.
 */

/**
 * Error thrown when a transform is called with a domain tag outside the
 * registry's DomainSet
 */
export class UnknownDomainError extends Error {
  constructor(
    public readonly domain: string,
    public readonly allowed: readonly string[]
  ) {
    super(`Unknown rating domain "${domain}" (expected one of: ${allowed.join(', ')})`);
    this.name = 'UnknownDomainError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnknownDomainError);
    }
  }
}

/**
 * Error thrown when a required extract is missing or cannot be read
 *
 * RECOVERY:
 * - Check the raw directory contains 03_occupation_data.sql
 * - Re-download the dump if the SQL script fails to execute
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ExtractionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExtractionError);
    }
  }
}

/**
 * Error thrown when a config file or environment override is invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/**
 * Error thrown when occupations reference major groups that are not loaded
 *
 * Occupation codes carry no quarantine path, so a malformed code surfaces
 * here as an unknown `major_group_code`.
 */
export class ForeignKeyViolationError extends Error {
  constructor(
    public readonly table: string,
    public readonly column: string,
    public readonly missingKeys: readonly string[]
  ) {
    super(
      `${table}.${column} references ${missingKeys.length} unknown key(s): ` +
        missingKeys.slice(0, 10).join(', ') +
        (missingKeys.length > 10 ? ', ...' : '')
    );
    this.name = 'ForeignKeyViolationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ForeignKeyViolationError);
    }
  }
}

/**
 * Error thrown when post-load warehouse checks fail
 */
export class WarehouseValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: readonly string[]
  ) {
    super(message);
    this.name = 'WarehouseValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WarehouseValidationError);
    }
  }

  /**
   * Get formatted summary of failed checks
   */
  getSummary(): string {
    const lines: string[] = [`Warehouse validation failed (${this.errors.length} checks):`];

    for (const error of this.errors) {
      lines.push(`  - ${error}`);
    }

    return lines.join('\n');
  }
}
