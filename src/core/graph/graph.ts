/**
 * In-memory dependency graph for festival tasks.
 *
 * Nodes are keyed by task id. Edges keep discovery order; the in-degree and
 * adjacency indexes are updated as each edge is added. Cycles are allowed
 * here and detected by the algorithms that need acyclicity.
 */

import type {
  Dependency,
  DependencyType,
  GraphRecord,
  GraphTask,
  TaskStatus,
  UnresolvedReference,
} from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { FestGraphError } from '../errors.js';

export class TaskGraph {
  private readonly tasks = new Map<string, GraphTask>();
  private readonly byPath = new Map<string, GraphTask>();
  private readonly edgeList: Dependency[] = [];
  private readonly inDegree = new Map<string, number>();
  private readonly outgoing = new Map<string, GraphTask[]>();
  private readonly incoming = new Map<string, GraphTask[]>();
  private readonly unresolved: UnresolvedReference[] = [];

  /** Add a task node. A second task with an existing id is ignored. */
  addTask(task: GraphTask): void {
    if (this.tasks.has(task.id)) return;
    this.tasks.set(task.id, task);
    if (task.path !== undefined) this.byPath.set(task.path, task);
    this.inDegree.set(task.id, 0);
    this.outgoing.set(task.id, []);
    this.incoming.set(task.id, []);
  }

  /**
   * Add an edge meaning "`to` requires `from`".
   * Both endpoints must already be nodes of this graph.
   */
  addDependency(from: GraphTask, to: GraphTask, type: DependencyType, required: boolean): Dependency {
    const source = this.outgoing.get(from.id);
    const target = this.incoming.get(to.id);
    if (!source || !target) {
      throw new FestGraphError(
        ExitCode.DEPENDENCY_ERROR,
        `Cannot add edge ${from.id} -> ${to.id}: both tasks must be added first`,
      );
    }

    const edge: Dependency = { from, to, type, required };
    this.edgeList.push(edge);
    this.inDegree.set(to.id, (this.inDegree.get(to.id) ?? 0) + 1);
    source.push(to);
    target.push(from);
    return edge;
  }

  /** Note a declared reference that matched no task. */
  addUnresolved(miss: UnresolvedReference): void {
    this.unresolved.push(miss);
  }

  /** Unmatched references in the order they were declared. */
  getUnresolved(): readonly UnresolvedReference[] {
    return this.unresolved;
  }

  getTask(id: string): GraphTask | undefined {
    return this.tasks.get(id);
  }

  /** Look up a task by its absolute file path. */
  getTaskByPath(path: string): GraphTask | undefined {
    return this.byPath.get(path);
  }

  hasTask(id: string): boolean {
    return this.tasks.has(id);
  }

  /** All tasks in insertion order. */
  getTasks(): GraphTask[] {
    return [...this.tasks.values()];
  }

  /** All edges in discovery order. */
  getEdges(): readonly Dependency[] {
    return this.edgeList;
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Number of incoming edges (parallel edges counted separately). */
  getInDegree(id: string): number {
    return this.inDegree.get(id) ?? 0;
  }

  /** Successor list including repeats for parallel edges. */
  getOutgoing(id: string): readonly GraphTask[] {
    return this.outgoing.get(id) ?? [];
  }

  /** Predecessor list including repeats for parallel edges. */
  getIncoming(id: string): readonly GraphTask[] {
    return this.incoming.get(id) ?? [];
  }

  /** Distinct direct prerequisites of a task. Empty for an unknown id. */
  getDependencies(id: string): GraphTask[] {
    return distinct(this.getIncoming(id));
  }

  /** Distinct tasks that directly require this one. Empty for an unknown id. */
  getDependents(id: string): GraphTask[] {
    return distinct(this.getOutgoing(id));
  }

  /**
   * Update a task's progress status.
   * @returns false when no task has this id
   */
  setStatus(id: string, status: TaskStatus): boolean {
    const task = this.tasks.get(id);
    if (!task) return false;
    task.status = status;
    return true;
  }

  /** Plain-data form with edge endpoints as ids. */
  toJSON(): GraphRecord {
    const tasks: GraphRecord['tasks'] = {};
    for (const [id, task] of this.tasks) {
      tasks[id] = task;
    }
    return {
      tasks,
      edges: this.edgeList.map((e) => ({
        from: e.from.id,
        to: e.to.id,
        type: e.type,
        required: e.required,
      })),
    };
  }
}

function distinct(tasks: readonly GraphTask[]): GraphTask[] {
  const seen = new Set<string>();
  const result: GraphTask[] = [];
  for (const task of tasks) {
    if (seen.has(task.id)) continue;
    seen.add(task.id);
    result.push(task);
  }
  return result;
}
