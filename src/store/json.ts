/**
 * JSON file reading for festgraph configuration files.
 */

import { readFile } from 'node:fs/promises';
import { FestGraphError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read a file as UTF-8, returning null if it does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw new FestGraphError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read and parse a JSON object file.
 * Returns null if the file does not exist.
 */
export async function readJsonObject(filePath: string): Promise<Record<string, unknown> | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new FestGraphError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new FestGraphError(
      ExitCode.CONFIG_ERROR,
      `Expected a JSON object in: ${filePath}`,
    );
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
