/**
 * Festival resolver: walks festival -> phase -> sequence -> task file and
 * builds a TaskGraph.
 *
 * Every node is added before any edge. Implicit edges come from filename
 * numbering within each sequence; explicit edges come from declared
 * references once the whole scope is loaded. Unreadable directories and
 * files degrade the result instead of failing it.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import { getLogger } from '../logger.js';
import { FestGraphError } from '../errors.js';
import { toTaskId } from '../paths.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { LayoutConfig } from '../../types/config.js';
import type { GraphTask } from '../../types/task.js';
import { TaskGraph } from './graph.js';
import { extractTaskMetadata } from './metadata.js';
import { addExplicitDependencies } from './references.js';

const DEFAULT_LAYOUT: LayoutConfig = {
  taskExtension: '.md',
  goalMarker: 'GOAL',
};

/** Options shared by both resolution scopes. */
export interface ResolveOptions {
  /** Directory conventions; defaults to `.md` tasks and `GOAL` marker files. */
  layout?: Partial<LayoutConfig>;
  /** Checked before each phase and each sequence. */
  signal?: AbortSignal;
}

interface ResolveContext {
  root: string;
  layout: LayoutConfig;
  signal?: AbortSignal;
  log: Logger;
}

function createContext(root: string, options: ResolveOptions): ResolveContext {
  return {
    root,
    layout: { ...DEFAULT_LAYOUT, ...options.layout },
    signal: options.signal,
    log: getLogger('resolver'),
  };
}

function checkCancelled(ctx: ResolveContext, where: string): void {
  if (ctx.signal?.aborted) {
    throw new FestGraphError(ExitCode.OPERATION_CANCELLED, `Resolution cancelled before ${where}`, {
      cause: ctx.signal.reason,
    });
  }
}

/** Phase and sequence directory names: leading digit, not hidden or underscored. */
export function isNumberedDir(name: string): boolean {
  if (name.length < 2) return false;
  if (name.startsWith('.') || name.startsWith('_')) return false;
  return /^\d/.test(name);
}

/**
 * Numbered subdirectories of `dir`, sorted by name. Zero-padded prefixes
 * make this the numeric order. Returns null if `dir` cannot be listed.
 */
function listNumberedDirs(ctx: ResolveContext, dir: string): string[] | null {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && isNumberedDir(entry.name))
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(dir, name));
  } catch (err) {
    ctx.log.warn({ dir, err }, 'Skipping unreadable directory');
    return null;
  }
}

function readTaskContent(ctx: ResolveContext, filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    ctx.log.debug({ filePath, err }, 'Task file unreadable; using default metadata');
    return '';
  }
}

/**
 * Load the tracked task files of one sequence, sorted by number then filename.
 */
function loadSequenceTasks(ctx: ResolveContext, seqPath: string, phasePath: string): GraphTask[] {
  let filenames: string[];
  try {
    filenames = readdirSync(seqPath, { withFileTypes: true })
      .filter((entry) => !entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    ctx.log.warn({ dir: seqPath, err }, 'Skipping unreadable sequence');
    return [];
  }

  const { taskExtension, goalMarker } = ctx.layout;
  const tasks: GraphTask[] = [];

  for (const filename of filenames) {
    if (!filename.endsWith(taskExtension)) continue;
    if (goalMarker && filename.toUpperCase().includes(goalMarker.toUpperCase())) continue;
    if (!/^\d/.test(filename)) continue;

    const filePath = join(seqPath, filename);
    const meta = extractTaskMetadata(filePath, readTaskContent(ctx, filePath), taskExtension);
    if (meta.number === null) continue;
    if (!meta.tracked) {
      ctx.log.debug({ filePath }, 'Skipping untracked task file');
      continue;
    }

    tasks.push({
      id: toTaskId(ctx.root, filePath),
      name: meta.name,
      number: meta.number,
      path: filePath,
      sequencePath: seqPath,
      phasePath,
      parallelGroup: meta.parallelGroup ?? meta.number,
      status: meta.status ?? 'pending',
      dependencies: meta.dependencies,
      softDeps: meta.softDeps,
      ...(meta.autonomyLevel !== undefined && { autonomyLevel: meta.autonomyLevel }),
    });
  }

  // Array.prototype.sort is stable, so filename order holds within a number.
  return tasks.sort((a, b) => a.number - b.number);
}

/**
 * Barrier edges between adjacent present numbers of one sequence: every task
 * at one number precedes every task at the next number present. Tasks that
 * share a number get no edge between them.
 */
export function addImplicitDependencies(graph: TaskGraph, tasks: GraphTask[]): void {
  const byNumber = new Map<number, GraphTask[]>();
  for (const task of tasks) {
    const group = byNumber.get(task.number);
    if (group) group.push(task);
    else byNumber.set(task.number, [task]);
  }

  const levels = [...byNumber.entries()].sort(([a], [b]) => a - b).map(([, group]) => group);
  levels.forEach((current, i) => {
    const previous = i > 0 ? levels[i - 1] : undefined;
    if (!previous) return;
    for (const task of current) {
      for (const prev of previous) {
        graph.addDependency(prev, task, 'implicit', true);
      }
    }
  });
}

function addSequence(ctx: ResolveContext, graph: TaskGraph, seqPath: string, phasePath: string): void {
  const tasks = loadSequenceTasks(ctx, seqPath, phasePath);
  for (const task of tasks) {
    graph.addTask(task);
  }
  addImplicitDependencies(graph, tasks);
  ctx.log.debug({ sequence: seqPath, tasks: tasks.length }, 'Loaded sequence');
}

function finish(ctx: ResolveContext, graph: TaskGraph): TaskGraph {
  const unresolved = addExplicitDependencies(graph, ctx.layout.taskExtension);
  for (const { taskId, ref, required } of unresolved) {
    ctx.log.debug({ taskId, ref, required }, 'Unresolved dependency reference');
  }
  ctx.log.debug(
    { root: ctx.root, tasks: graph.size, edges: graph.getEdges().length, unresolved: unresolved.length },
    'Resolved dependency graph',
  );
  return graph;
}

/**
 * Build the complete dependency graph of a festival.
 * A festival root that cannot be listed yields an empty graph.
 */
export function resolveFestival(festivalRoot: string, options: ResolveOptions = {}): TaskGraph {
  const ctx = createContext(resolve(festivalRoot), options);
  const graph = new TaskGraph();

  for (const phasePath of listNumberedDirs(ctx, ctx.root) ?? []) {
    checkCancelled(ctx, `phase ${phasePath}`);
    ctx.log.debug({ phase: phasePath }, 'Entering phase');
    for (const seqPath of listNumberedDirs(ctx, phasePath) ?? []) {
      checkCancelled(ctx, `sequence ${seqPath}`);
      addSequence(ctx, graph, seqPath, phasePath);
    }
  }

  return finish(ctx, graph);
}

/**
 * Build the dependency graph of a single sequence. Task ids stay relative to
 * the festival root (two levels up), so they match a full resolution.
 * References to tasks outside the sequence resolve to nothing.
 */
export function resolveSequence(sequencePath: string, options: ResolveOptions = {}): TaskGraph {
  const seqPath = resolve(sequencePath);
  const phasePath = dirname(seqPath);
  const ctx = createContext(dirname(phasePath), options);
  const graph = new TaskGraph();

  checkCancelled(ctx, `sequence ${seqPath}`);
  addSequence(ctx, graph, seqPath, phasePath);

  return finish(ctx, graph);
}
