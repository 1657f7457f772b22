/**
 * Path resolution for festgraph.
 *
 * Environment variables:
 *   FESTGRAPH_HOME - Global configuration directory (default: ~/.festgraph)
 */

import { resolve, dirname, join, relative, sep, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import { existsSync } from 'node:fs';
import { FestGraphError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Per-festival data directory name. */
export const PROJECT_DIR_NAME = '.festgraph';

/** Files whose presence marks a festival root. */
export const FESTIVAL_MARKERS = ['FESTIVAL_OVERVIEW.md', 'fest.yaml', 'FESTIVAL_GOAL.md'] as const;

/**
 * Get the global festgraph home directory.
 * Respects FESTGRAPH_HOME env var, defaults to ~/.festgraph.
 */
export function getFestGraphHome(): string {
  return process.env['FESTGRAPH_HOME'] ?? join(homedir(), PROJECT_DIR_NAME);
}

/** Path to the global config file. */
export function getGlobalConfigPath(): string {
  return join(getFestGraphHome(), 'config.json');
}

/** Absolute path to a festival's data directory. */
export function getProjectDir(festivalRoot: string): string {
  return join(resolve(festivalRoot), PROJECT_DIR_NAME);
}

/** Path to a festival's project config file. */
export function getConfigPath(festivalRoot: string): string {
  return join(getProjectDir(festivalRoot), 'config.json');
}

/**
 * Walk upward from `startPath` to the first directory holding a festival
 * marker file.
 */
export function findFestivalRoot(startPath: string): string {
  let current = resolve(startPath);
  for (;;) {
    if (FESTIVAL_MARKERS.some((marker) => existsSync(join(current, marker)))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  throw new FestGraphError(ExitCode.NOT_FOUND, `Not inside a festival: ${startPath}`, {
    fix: 'Run from a directory below a festival root (FESTIVAL_OVERVIEW.md, fest.yaml or FESTIVAL_GOAL.md)',
  });
}

/**
 * Map a working directory inside a festival to the sequence directory that
 * contains it. Returns null when cwd is the root, a phase, or outside the
 * festival.
 */
export function findSequencePath(cwd: string, festivalRoot: string): string | null {
  const rel = relative(resolve(festivalRoot), resolve(cwd));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;

  const [phase, sequence] = rel.split(sep);
  if (phase === undefined || sequence === undefined) return null;
  return join(resolve(festivalRoot), phase, sequence);
}

/** Festival root for a sequence directory (sequence -> phase -> festival). */
export function festivalRootOf(sequencePath: string): string {
  return dirname(dirname(resolve(sequencePath)));
}

/**
 * Stable task id: the file's path relative to the festival root, with `/`
 * separators on every platform.
 */
export function toTaskId(festivalRoot: string, filePath: string): string {
  return relative(festivalRoot, filePath).split(sep).join('/');
}
