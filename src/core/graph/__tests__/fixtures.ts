/**
 * Graph builders and on-disk festival fixtures shared by the graph tests.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { GraphTask } from '../../../types/task.js';
import { TaskGraph } from '../graph.js';

export const ROOT = join('/', 'festivals', 'demo');
export const SEQ = join(ROOT, '001_PLAN', '01_core');

/** A pending task in SEQ whose id doubles as its name. */
export function makeTask(id: string, number: number, overrides: Partial<GraphTask> = {}): GraphTask {
  const sequencePath = overrides.sequencePath ?? SEQ;
  return {
    id,
    name: id,
    number,
    path: join(sequencePath, `${String(number).padStart(2, '0')}_${id}.md`),
    sequencePath,
    phasePath: join(sequencePath, '..'),
    parallelGroup: number,
    status: 'pending',
    dependencies: [],
    softDeps: [],
    ...overrides,
  };
}

/** Graph of the given tasks plus `[from, to]` hard explicit edges. */
export function buildGraph(tasks: GraphTask[], edges: Array<[string, string]> = []): TaskGraph {
  const graph = new TaskGraph();
  for (const task of tasks) graph.addTask(task);
  for (const [from, to] of edges) {
    const source = graph.getTask(from);
    const target = graph.getTask(to);
    if (!source || !target) throw new Error(`fixture edge ${from} -> ${to} names an unknown task`);
    graph.addDependency(source, target, 'explicit', true);
  }
  return graph;
}

/** a -> {b, c} -> d */
export function diamond(): TaskGraph {
  return buildGraph(
    [makeTask('a', 1), makeTask('b', 2), makeTask('c', 2), makeTask('d', 3)],
    [['a', 'b'], ['a', 'c'], ['b', 'd'], ['c', 'd']],
  );
}

export function ids(tasks: readonly GraphTask[]): string[] {
  return tasks.map((t) => t.id);
}

/**
 * Write a festival under a fresh temp directory. Keys are paths relative to
 * the festival root; FESTIVAL_OVERVIEW.md is added unless given.
 */
export function writeFestival(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), 'festgraph-test-'));
  const all = { 'FESTIVAL_OVERVIEW.md': '# Festival\n', ...files };
  for (const [rel, content] of Object.entries(all)) {
    const filePath = join(root, rel);
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, content);
  }
  return root;
}

/** Frontmatter block for a task file. */
export function frontmatter(fields: Record<string, string>): string {
  const lines = Object.entries(fields).map(([key, value]) => `${key}: ${value}`);
  return ['---', ...lines, '---', ''].join('\n');
}
