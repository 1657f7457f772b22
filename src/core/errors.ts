/**
 * festgraph error types with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for festgraph operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class FestGraphError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'FestGraphError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/**
 * A dependency cycle. Returned by topologicalSort rather than thrown, so
 * callers must check for it explicitly.
 */
export class CycleError extends FestGraphError {
  /** Task ids on the cycle, or the unsortable remainder when no cycle path was recovered. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(ExitCode.CIRCULAR_REFERENCE, describeCycle(cycle), {
      fix: 'Remove one of the declared dependencies on the reported path',
    });
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

function describeCycle(cycle: string[]): string {
  if (cycle.length === 0) return 'circular dependency detected';
  return `circular dependency: ${cycle[0]} -> ... -> ${cycle[cycle.length - 1]}`;
}
