/**
 * Shared command plumbing: locating the festival, loading its config, and
 * reporting errors in the JSON envelope.
 */

import { resolve } from 'node:path';
import { loadConfig } from '../core/config.js';
import { FestGraphError } from '../core/errors.js';
import { formatError } from '../core/output.js';
import { findFestivalRoot } from '../core/paths.js';
import type { FestGraphConfig } from '../types/config.js';

/** Where a command runs and with which configuration. */
export interface FestivalContext {
  /** Absolute directory the command treats as its cwd. */
  cwd: string;
  /** Festival root found above `cwd`. */
  root: string;
  config: FestGraphConfig;
}

/** Options every festival command accepts. */
export interface DirOption {
  dir?: string;
}

export async function loadFestivalContext(opts: DirOption): Promise<FestivalContext> {
  const cwd = resolve(opts.dir ?? process.cwd());
  const root = findFestivalRoot(cwd);
  const config = await loadConfig(root);
  return { cwd, root, config };
}

/**
 * Print a FestGraphError envelope to stderr and set the exit code.
 * Anything else is rethrown for commander to report.
 */
export function handleCommandError(err: unknown, operation: string): void {
  if (err instanceof FestGraphError) {
    console.error(formatError(err, operation));
    process.exitCode = err.code;
    return;
  }
  throw err;
}
