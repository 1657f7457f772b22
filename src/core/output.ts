/**
 * JSON envelope formatting for festgraph CLI output.
 *
 * Every command prints exactly one envelope: results on stdout as
 * { success: true, result, _meta }, errors on stderr as { success: false, error, _meta }.
 */

import { FestGraphError } from './errors.js';

/** Envelope metadata. */
export interface OutputMeta {
  operation: string;
  timestamp: string;
}

function createMeta(operation: string): OutputMeta {
  return { operation, timestamp: new Date().toISOString() };
}

/**
 * Format a successful result.
 * Values with a toJSON method (the graph) serialize through it.
 */
export function formatSuccess<T>(data: T, operation = 'cli.output', message?: string): string {
  return JSON.stringify({
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation),
  });
}

/** Format a festgraph error. */
export function formatError(error: FestGraphError, operation = 'cli.output'): string {
  return JSON.stringify({
    ...error.toJSON(),
    _meta: createMeta(operation),
  });
}
