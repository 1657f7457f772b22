/**
 * Graph algorithms over a populated TaskGraph: ordering, cycle detection,
 * parallel levels, critical path and the status-driven ready set.
 *
 * Hard and soft edges are treated alike everywhere in this module.
 */

import { CycleError } from '../errors.js';
import type { GraphTask } from '../../types/task.js';
import type { TaskGraph } from './graph.js';

/** Outcome of a topological sort; a cycle is a value, not an exception. */
export type TopologicalSortResult =
  | { ok: true; order: GraphTask[] }
  | { ok: false; error: CycleError };

/** Ascending number, then id. */
export function compareTasks(a: GraphTask, b: GraphTask): number {
  if (a.number !== b.number) return a.number - b.number;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Kahn's algorithm. When several tasks are eligible at once the lowest
 * number (then id) goes first, so the order is stable for an unchanged graph.
 */
export function topologicalSort(graph: TaskGraph): TopologicalSortResult {
  const inDegree = new Map<string, number>();
  const queue: GraphTask[] = [];

  for (const task of graph.getTasks()) {
    const degree = graph.getInDegree(task.id);
    inDegree.set(task.id, degree);
    if (degree === 0) queue.push(task);
  }
  queue.sort(compareTasks);

  const order: GraphTask[] = [];
  while (queue.length > 0) {
    const task = queue.shift();
    if (!task) break;
    order.push(task);

    let released = false;
    for (const dependent of graph.getOutgoing(task.id)) {
      const remaining = (inDegree.get(dependent.id) ?? 1) - 1;
      inDegree.set(dependent.id, remaining);
      if (remaining === 0) {
        queue.push(dependent);
        released = true;
      }
    }
    if (released) queue.sort(compareTasks);
  }

  if (order.length !== graph.size) {
    const emitted = new Set(order.map((t) => t.id));
    const cycle = findCycle(graph);
    const remainder = graph.getTasks().filter((t) => !emitted.has(t.id)).map((t) => t.id);
    return { ok: false, error: new CycleError(cycle.length > 0 ? cycle : remainder) };
  }

  return { ok: true, order };
}

/**
 * Find one cycle with a three-color DFS over outgoing edges.
 * Returns the ids along the cycle with the first id repeated at the end,
 * or an empty array for an acyclic graph.
 */
export function findCycle(graph: TaskGraph): string[] {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  function visit(id: string): string[] | null {
    state.set(id, 'visiting');
    stack.push(id);

    for (const next of graph.getOutgoing(id)) {
      const seen = state.get(next.id);
      if (seen === 'visiting') {
        return [...stack.slice(stack.indexOf(next.id)), next.id];
      }
      if (seen === undefined) {
        const cycle = visit(next.id);
        if (cycle) return cycle;
      }
    }

    stack.pop();
    state.set(id, 'done');
    return null;
  }

  for (const task of graph.getTasks()) {
    if (state.has(task.id)) continue;
    const cycle = visit(task.id);
    if (cycle) return cycle;
  }
  return [];
}

/** True if any back-edge exists. */
export function hasCycle(graph: TaskGraph): boolean {
  return findCycle(graph).length > 0;
}

/**
 * Peel the graph into levels: level k holds every task whose prerequisites
 * all sit in levels below k. Returns [] when a cycle keeps some task from
 * ever becoming eligible.
 */
export function getParallelGroups(graph: TaskGraph): GraphTask[][] {
  const inDegree = new Map<string, number>();
  let wave: GraphTask[] = [];

  for (const task of graph.getTasks()) {
    const degree = graph.getInDegree(task.id);
    inDegree.set(task.id, degree);
    if (degree === 0) wave.push(task);
  }

  const groups: GraphTask[][] = [];
  let emitted = 0;

  while (wave.length > 0) {
    wave.sort(compareTasks);
    groups.push(wave);
    emitted += wave.length;

    const next: GraphTask[] = [];
    for (const task of wave) {
      for (const dependent of graph.getOutgoing(task.id)) {
        const remaining = (inDegree.get(dependent.id) ?? 1) - 1;
        inDegree.set(dependent.id, remaining);
        if (remaining === 0) next.push(dependent);
      }
    }
    wave = next;
  }

  return emitted === graph.size ? groups : [];
}

/**
 * Longest chain of dependent tasks, counted in tasks.
 *
 * Ties on chain length go to the task reached first in topological order,
 * and among predecessors to the earliest edge. Empty when the graph has no
 * edges or contains a cycle.
 */
export function getCriticalPath(graph: TaskGraph): GraphTask[] {
  if (graph.getEdges().length === 0) return [];

  const sorted = topologicalSort(graph);
  if (!sorted.ok) return [];

  const longest = new Map<string, number>();
  const previous = new Map<string, GraphTask>();

  for (const task of sorted.order) {
    let best = 0;
    for (const pred of graph.getIncoming(task.id)) {
      const length = longest.get(pred.id) ?? 0;
      if (length > best) {
        best = length;
        previous.set(task.id, pred);
      }
    }
    longest.set(task.id, best + 1);
  }

  let end: GraphTask | undefined;
  let endLength = 0;
  for (const task of sorted.order) {
    const length = longest.get(task.id) ?? 0;
    if (length > endLength) {
      end = task;
      endLength = length;
    }
  }

  const path: GraphTask[] = [];
  for (let cur = end; cur; cur = previous.get(cur.id)) {
    path.unshift(cur);
  }
  return path;
}

/**
 * Pending tasks whose every prerequisite is complete, evaluated against the
 * statuses present at call time.
 */
export function getReadyTasks(graph: TaskGraph): GraphTask[] {
  return graph
    .getTasks()
    .filter((task) =>
      task.status === 'pending'
      && graph.getIncoming(task.id).every((dep) => dep.status === 'complete'),
    )
    .sort(compareTasks);
}
