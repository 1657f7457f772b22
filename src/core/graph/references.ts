/**
 * Resolution of declared dependency references against a built graph.
 *
 * Supported reference forms:
 *   - `task_name` / `task_name.md`   same-sequence name match
 *   - `01_task_name`                 same-sequence filename
 *   - `../02_other/03_task`          another sequence in the same phase
 *   - `../../002_PHASE/01_seq/01_x`  another phase
 */

import { join } from 'node:path';
import type { DependencyType, GraphTask, UnresolvedReference } from '../../types/task.js';
import type { TaskGraph } from './graph.js';

function withExtension(path: string, taskExtension: string): string {
  return path.endsWith(taskExtension) ? path : path + taskExtension;
}

function stripExtension(ref: string, taskExtension: string): string {
  return ref.endsWith(taskExtension) ? ref.slice(0, ref.length - taskExtension.length) : ref;
}

/**
 * Resolve one raw reference declared by `from`.
 * Returns undefined when nothing matches; callers decide whether that matters.
 */
export function resolveTaskReference(
  graph: TaskGraph,
  from: GraphTask,
  rawRef: string,
  taskExtension = '.md',
): GraphTask | undefined {
  const ref = rawRef.trim();
  if (ref === '') return undefined;

  if (ref.startsWith('..')) {
    return graph.getTaskByPath(withExtension(join(from.sequencePath, ref), taskExtension));
  }

  const bare = stripExtension(ref, taskExtension);
  for (const task of graph.getTasks()) {
    if (task.sequencePath !== from.sequencePath) continue;
    if (task.name === ref || task.name === bare) return task;
  }

  return graph.getTaskByPath(withExtension(join(from.sequencePath, ref), taskExtension));
}

/** Edge type for a declared reference from `dep` to `task`. */
export function classifyDependency(dep: GraphTask, task: GraphTask): DependencyType {
  if (dep.sequencePath === task.sequencePath) return 'explicit';
  if (dep.phasePath === task.phasePath) return 'cross_sequence';
  return 'cross_phase';
}

/**
 * Add an edge for every resolvable hard and soft reference of every task.
 * Unresolved references add no edge; they are recorded on the graph and
 * returned.
 */
export function addExplicitDependencies(graph: TaskGraph, taskExtension = '.md'): UnresolvedReference[] {
  const unresolved: UnresolvedReference[] = [];

  for (const task of graph.getTasks()) {
    const declared = [
      ...task.dependencies.map((ref) => ({ ref, required: true })),
      ...task.softDeps.map((ref) => ({ ref, required: false })),
    ];
    for (const { ref, required } of declared) {
      const dep = resolveTaskReference(graph, task, ref, taskExtension);
      if (dep) {
        graph.addDependency(dep, task, classifyDependency(dep, task), required);
      } else {
        const miss = { taskId: task.id, ref, required };
        graph.addUnresolved(miss);
        unresolved.push(miss);
      }
    }
  }

  return unresolved;
}
