/**
 * Configuration type definitions for festgraph.
 * Covers project and global config with cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to .festgraph/ (default: 'logs/festgraph.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Festival directory conventions consumed by the resolver. */
export interface LayoutConfig {
  /** Extension a task file must carry (default: '.md'). */
  taskExtension: string;
  /** Case-insensitive marker; filenames containing it are goal files, not tasks. */
  goalMarker: string;
}

/** Validation toggles. */
export interface ValidationConfig {
  /** Report NUMBERING_GAP warnings (default: true). */
  numberingGaps: boolean;
}

/** festgraph configuration (config.json). */
export interface FestGraphConfig {
  logging: LoggingConfig;
  layout: LayoutConfig;
  validation: ValidationConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
