/**
 * Read-side views of a resolved graph, shaped as plain data for output.
 */

import { basename } from 'node:path';
import type { DependencyType, GraphTask } from '../../types/task.js';
import type { TaskGraph } from './graph.js';
import {
  getCriticalPath,
  getParallelGroups,
  getReadyTasks,
  topologicalSort,
} from './algorithms.js';

/** Compact task reference for output. */
export interface TaskRef {
  id: string;
  name: string;
  number: number;
  status: string;
}

/** Upstream tree node. */
export interface DependencyTreeNode {
  id: string;
  name: string;
  /** Present when this task was already shown higher up the branch. */
  cycle?: true;
  /** Present when the task has no prerequisites. */
  root?: true;
  dependencies: DependencyTreeNode[];
}

/** Whole-graph summary. */
export interface GraphOverview {
  totalTasks: number;
  totalEdges: number;
  edgesByType: Record<DependencyType, number>;
  executionOrder: TaskRef[] | null;
  cycle: string[] | null;
  parallelGroups: TaskRef[][];
  criticalPath: TaskRef[];
  ready: TaskRef[];
}

/** One task with its neighbours. */
export interface TaskDepsView {
  task: GraphTask;
  dependsOn: TaskRef[];
  dependedBy: TaskRef[];
  tree: DependencyTreeNode;
}

export function toTaskRef(task: GraphTask): TaskRef {
  return { id: task.id, name: task.name, number: task.number, status: task.status };
}

/**
 * Find a task by id, name, filename, or filename without extension.
 * The first match in graph order wins.
 */
export function findTask(graph: TaskGraph, ref: string, taskExtension = '.md'): GraphTask | undefined {
  const byId = graph.getTask(ref);
  if (byId) return byId;

  return graph.getTasks().find((task) => {
    if (task.name === ref) return true;
    const filename = basename(task.path ?? task.id);
    return filename === ref || filename === ref + taskExtension;
  });
}

/**
 * Upstream dependency tree of a task. A task met again on the same branch
 * is marked `cycle` and not expanded.
 */
export function getDependencyTree(graph: TaskGraph, id: string): DependencyTreeNode | undefined {
  const start = graph.getTask(id);
  if (!start) return undefined;

  function build(task: GraphTask, branch: Set<string>): DependencyTreeNode {
    if (branch.has(task.id)) {
      return { id: task.id, name: task.name, cycle: true, dependencies: [] };
    }
    const deps = graph.getDependencies(task.id);
    if (deps.length === 0) {
      return { id: task.id, name: task.name, root: true, dependencies: [] };
    }
    const next = new Set(branch).add(task.id);
    return { id: task.id, name: task.name, dependencies: deps.map((dep) => build(dep, next)) };
  }

  return build(start, new Set());
}

/** Everything the `deps` command shows for a graph. */
export function getGraphOverview(graph: TaskGraph): GraphOverview {
  const edgesByType: Record<DependencyType, number> = {
    implicit: 0,
    explicit: 0,
    cross_sequence: 0,
    cross_phase: 0,
  };
  for (const edge of graph.getEdges()) {
    edgesByType[edge.type]++;
  }

  const sorted = topologicalSort(graph);
  return {
    totalTasks: graph.size,
    totalEdges: graph.getEdges().length,
    edgesByType,
    executionOrder: sorted.ok ? sorted.order.map(toTaskRef) : null,
    cycle: sorted.ok ? null : sorted.error.cycle,
    parallelGroups: getParallelGroups(graph).map((group) => group.map(toTaskRef)),
    criticalPath: getCriticalPath(graph).map(toTaskRef),
    ready: getReadyTasks(graph).map(toTaskRef),
  };
}

/** Neighbours and upstream tree of one task. */
export function getTaskDepsView(graph: TaskGraph, task: GraphTask): TaskDepsView {
  return {
    task,
    dependsOn: graph.getDependencies(task.id).map(toTaskRef),
    dependedBy: graph.getDependents(task.id).map(toTaskRef),
    tree: getDependencyTree(graph, task.id) ?? { id: task.id, name: task.name, root: true, dependencies: [] },
  };
}
