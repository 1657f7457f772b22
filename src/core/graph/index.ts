/**
 * Festival dependency graph: metadata extraction, resolution, algorithms
 * and validation.
 */

export { TaskGraph } from './graph.js';
export {
  compareTasks,
  findCycle,
  getCriticalPath,
  getParallelGroups,
  getReadyTasks,
  hasCycle,
  topologicalSort,
  type TopologicalSortResult,
} from './algorithms.js';
export {
  extractTaskMetadata,
  normalizeStatus,
  parseLegacyDependencies,
  parseTaskFilename,
  splitFrontmatter,
  TaskFrontmatterSchema,
  type TaskFrontmatter,
  type TaskMetadata,
} from './metadata.js';
export {
  addExplicitDependencies,
  classifyDependency,
  resolveTaskReference,
} from './references.js';
export {
  addImplicitDependencies,
  isNumberedDir,
  resolveFestival,
  resolveSequence,
  type ResolveOptions,
} from './resolver.js';
export {
  checkCycles,
  checkNumberingGaps,
  checkReferences,
  validateFestival,
  validateSequence,
  type ValidateOptions,
  type ValidationResult,
} from './validate.js';
export {
  findTask,
  getDependencyTree,
  getGraphOverview,
  getTaskDepsView,
  toTaskRef,
  type DependencyTreeNode,
  type GraphOverview,
  type TaskDepsView,
  type TaskRef,
} from './queries.js';
