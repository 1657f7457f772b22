/**
 * Dependency validation: resolves a festival (or one sequence) and reports
 * structural problems as issues instead of throwing.
 *
 * Errors: CYCLE_DETECTED, MISSING_DEPENDENCY.
 * Warnings: MISSING_SOFT_DEPENDENCY, NUMBERING_GAP.
 */

import { getLogger } from '../logger.js';
import type { GraphTask, ValidationIssue } from '../../types/task.js';
import type { TaskGraph } from './graph.js';
import { topologicalSort } from './algorithms.js';
import { resolveFestival, resolveSequence, type ResolveOptions } from './resolver.js';

/** Outcome of a validation pass. */
export interface ValidationResult {
  /** false when any error was found; warnings never affect it. */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  graph: TaskGraph;
}

/** Resolution options plus validation toggles. */
export interface ValidateOptions extends ResolveOptions {
  /** Report NUMBERING_GAP warnings (default: true). */
  numberingGaps?: boolean;
}

/** CYCLE_DETECTED error when the graph cannot be ordered. */
export function checkCycles(graph: TaskGraph): ValidationIssue[] {
  const sorted = topologicalSort(graph);
  if (sorted.ok) return [];
  const { cycle } = sorted.error;
  return [{
    ...(cycle[0] !== undefined && { taskId: cycle[0] }),
    code: 'CYCLE_DETECTED',
    message: `Circular dependency detected: ${cycle.join(' -> ')}`,
    severity: 'error',
  }];
}

/**
 * Declared references the resolver could not match: hard ones as errors,
 * soft ones as warnings.
 */
export function checkReferences(graph: TaskGraph): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  for (const { taskId, ref, required } of graph.getUnresolved()) {
    const name = graph.getTask(taskId)?.name ?? taskId;
    if (required) {
      errors.push({
        taskId,
        code: 'MISSING_DEPENDENCY',
        message: `Task ${name} declares dependency on ${JSON.stringify(ref)} which does not exist`,
        severity: 'error',
      });
    } else {
      warnings.push({
        taskId,
        code: 'MISSING_SOFT_DEPENDENCY',
        message: `Task ${name} declares soft dependency on ${JSON.stringify(ref)} which does not exist`,
        severity: 'warning',
      });
    }
  }

  return { errors, warnings };
}

/**
 * One warning per run of missing numbers in each sequence, counting from 1
 * up to the highest number present. Advisory only: implicit edges already
 * skip the gap.
 */
export function checkNumberingGaps(graph: TaskGraph): ValidationIssue[] {
  const bySequence = new Map<string, GraphTask[]>();
  for (const task of graph.getTasks()) {
    const group = bySequence.get(task.sequencePath);
    if (group) group.push(task);
    else bySequence.set(task.sequencePath, [task]);
  }

  const warnings: ValidationIssue[] = [];
  for (const seqPath of [...bySequence.keys()].sort()) {
    const present = [...new Set((bySequence.get(seqPath) ?? []).map((t) => t.number))].sort((a, b) => a - b);
    let expected = 1;
    for (const n of present) {
      if (n > expected) {
        const at = n - 1 === expected ? `position ${expected}` : `positions ${expected}-${n - 1}`;
        warnings.push({
          code: 'NUMBERING_GAP',
          message: `Sequence ${seqPath} has a gap in task numbering at ${at}`,
          severity: 'warning',
        });
      }
      expected = Math.max(expected, n + 1);
    }
  }
  return warnings;
}

function summarize(scope: string, result: ValidationResult): ValidationResult {
  getLogger('validate').info(
    {
      scope,
      valid: result.valid,
      errors: result.errors.length,
      warnings: result.warnings.length,
      tasks: result.graph.size,
    },
    'Dependency validation finished',
  );
  return result;
}

/**
 * Resolve a festival and check it for cycles, unresolved references and
 * numbering gaps.
 */
export function validateFestival(festivalRoot: string, options: ValidateOptions = {}): ValidationResult {
  const graph = resolveFestival(festivalRoot, options);
  const references = checkReferences(graph);

  const errors = [...checkCycles(graph), ...references.errors];
  const warnings = [
    ...references.warnings,
    ...(options.numberingGaps === false ? [] : checkNumberingGaps(graph)),
  ];

  return summarize(festivalRoot, { valid: errors.length === 0, errors, warnings, graph });
}

/**
 * Resolve one sequence and check it for cycles only; references leaving the
 * sequence cannot be judged from this scope.
 */
export function validateSequence(sequencePath: string, options: ResolveOptions = {}): ValidationResult {
  const graph = resolveSequence(sequencePath, options);
  const errors = checkCycles(graph);
  return summarize(sequencePath, { valid: errors.length === 0, errors, warnings: [], graph });
}
