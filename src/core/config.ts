/**
 * Configuration engine for festgraph.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { FestGraphConfig, ResolvedValue } from '../types/config.js';
import { isPlainObject, readJsonObject } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
const DEFAULTS: FestGraphConfig = {
  logging: {
    level: 'info',
    filePath: 'logs/festgraph.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  layout: {
    taskExtension: '.md',
    goalMarker: 'GOAL',
  },
  validation: {
    numberingGaps: true,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'FESTGRAPH_LOG_LEVEL': 'logging.level',
  'FESTGRAPH_LOG_FILE': 'logging.filePath',
  'FESTGRAPH_TASK_EXTENSION': 'layout.taskExtension',
  'FESTGRAPH_GOAL_MARKER': 'layout.goalMarker',
  'FESTGRAPH_NUMBERING_GAPS': 'validation.numberingGaps',
};

/** A fresh copy of the defaults. */
export function getDefaultConfig(): FestGraphConfig {
  return structuredClone(DEFAULTS);
}

/** The defaults as a plain record, for merging. */
function defaultsRecord(): Record<string, unknown> {
  const config = getDefaultConfig();
  return { logging: config.logging, layout: config.layout, validation: config.validation };
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Typed config from a merged record. A field (or whole section) whose merged
 * value has the wrong type falls back to its default.
 */
const ConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).catch(DEFAULTS.logging.level),
    filePath: z.string().catch(DEFAULTS.logging.filePath),
    maxFileSize: z.number().finite().catch(DEFAULTS.logging.maxFileSize),
    maxFiles: z.number().finite().catch(DEFAULTS.logging.maxFiles),
  }).catch(() => getDefaultConfig().logging),
  layout: z.object({
    taskExtension: z.string().catch(DEFAULTS.layout.taskExtension),
    goalMarker: z.string().catch(DEFAULTS.layout.goalMarker),
  }).catch(() => getDefaultConfig().layout),
  validation: z.object({
    numberingGaps: z.boolean().catch(DEFAULTS.validation.numberingGaps),
  }).catch(() => getDefaultConfig().validation),
});

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 *
 * @param festivalRoot - Festival whose `.festgraph/config.json` is layered in
 */
export async function loadConfig(festivalRoot?: string): Promise<FestGraphConfig> {
  let merged = defaultsRecord();

  // Layer 1: Global config
  const globalConfig = await readJsonObject(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  if (festivalRoot) {
    const projectConfig = await readJsonObject(getConfigPath(festivalRoot));
    if (projectConfig) {
      merged = deepMerge(merged, projectConfig);
    }
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  return ConfigSchema.parse(merged);
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  festivalRoot?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  if (festivalRoot) {
    const projectConfig = await readJsonObject(getConfigPath(festivalRoot));
    if (projectConfig) {
      const val = getNestedValue(projectConfig, path);
      if (val !== undefined) {
        return { value: val, source: 'project' };
      }
    }
  }

  const globalConfig = await readJsonObject(getGlobalConfigPath());
  if (globalConfig) {
    const val = getNestedValue(globalConfig, path);
    if (val !== undefined) {
      return { value: val, source: 'global' };
    }
  }

  return { value: getNestedValue(defaultsRecord(), path), source: 'default' };
}
