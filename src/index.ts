/**
 * festgraph - task dependency graphs for festival plans.
 */

// Types
export { ExitCode, getExitCodeName } from './types/exit-codes.js';
export type {
  Dependency,
  DependencyRecord,
  DependencyType,
  GraphRecord,
  GraphTask,
  IssueSeverity,
  TaskStatus,
  UnresolvedReference,
  ValidationIssue,
  ValidationIssueCode,
} from './types/task.js';
export type {
  ConfigSource,
  FestGraphConfig,
  LayoutConfig,
  LoggingConfig,
  LogLevel,
  ResolvedValue,
  ValidationConfig,
} from './types/config.js';

// Core
export { FestGraphError, CycleError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { getConfigValue, getDefaultConfig, loadConfig } from './core/config.js';
export { closeLogger, getLogger, initLogger } from './core/logger.js';
export {
  festivalRootOf,
  findFestivalRoot,
  findSequencePath,
  FESTIVAL_MARKERS,
} from './core/paths.js';

// Graph
export * from './core/graph/index.js';
