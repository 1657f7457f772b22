/**
 * Task graph type definitions.
 *
 * A task is one numbered file inside a sequence directory. Edges point from
 * the prerequisite to the task that waits on it.
 */

/** Task progress states. */
export type TaskStatus = 'pending' | 'in_progress' | 'complete';

/**
 * How an edge came to exist.
 * `implicit` edges come from filename numbering; the other three come from
 * declared references and are classified by where the two endpoints live.
 */
export type DependencyType = 'implicit' | 'explicit' | 'cross_sequence' | 'cross_phase';

/** A node in the dependency graph. */
export interface GraphTask {
  /** Opaque stable key (festival-relative path for resolved tasks). */
  id: string;
  /** Filename without numeric prefix and extension. */
  name: string;
  /** Leading digits of the filename. */
  number: number;
  /** Absolute file path; absent for tasks built outside the filesystem. */
  path?: string;
  sequencePath: string;
  phasePath: string;
  /** Defaults to `number`; overridable through `fest_parallel_group`. */
  parallelGroup: number;
  status: TaskStatus;
  /** Raw hard reference strings, in declaration order. */
  dependencies: string[];
  /** Raw soft reference strings, in declaration order. */
  softDeps: string[];
  autonomyLevel?: string;
}

/** A directed edge: `to` requires `from`. */
export interface Dependency {
  from: GraphTask;
  to: GraphTask;
  type: DependencyType;
  /** true for hard dependencies, false for soft ones. */
  required: boolean;
}

/** A declared reference that matched no task. */
export interface UnresolvedReference {
  taskId: string;
  ref: string;
  required: boolean;
}

/** Serializable edge shape (endpoints as ids). */
export interface DependencyRecord {
  from: string;
  to: string;
  type: DependencyType;
  required: boolean;
}

/** Serializable graph shape. */
export interface GraphRecord {
  tasks: Record<string, GraphTask>;
  edges: DependencyRecord[];
}

/** Severity of a validation issue. */
export type IssueSeverity = 'error' | 'warning';

/** Machine-readable validation issue codes. */
export type ValidationIssueCode =
  | 'CYCLE_DETECTED'
  | 'MISSING_DEPENDENCY'
  | 'MISSING_SOFT_DEPENDENCY'
  | 'NUMBERING_GAP';

/** A single validation finding. */
export interface ValidationIssue {
  taskId?: string;
  code: ValidationIssueCode;
  message: string;
  severity: IssueSeverity;
}
