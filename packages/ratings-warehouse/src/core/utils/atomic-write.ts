/**
 * Atomic Write Utilities
 *
 * Transform outputs are written to a temporary file and renamed into
 * place, so a crashed run never leaves a half-written NDJSON file that a
 * later load would pick up.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isMissingFileError(cleanupError)) {
        throw new AggregateError([error, cleanupError], `Failed to write ${filePath}`);
      }
    });
    throw error;
  }
}

/**
 * Atomically write records as newline-delimited JSON
 *
 * An empty list produces an empty file.
 */
export async function atomicWriteNdjson(
  filePath: string,
  records: readonly unknown[]
): Promise<void> {
  const body = records.map((record) => JSON.stringify(record)).join('\n');
  await atomicWriteFile(filePath, records.length > 0 ? `${body}\n` : '');
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
