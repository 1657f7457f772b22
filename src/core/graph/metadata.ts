/**
 * Task metadata extraction from a task file's name and content.
 *
 * Parsing is best-effort: a missing or malformed field yields its default
 * and never an error. Frontmatter is YAML between two `---` lines; the body
 * may also carry a legacy `Dependencies:` line and an `Autonomy:` label.
 */

import { basename } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { TaskStatus } from '../../types/task.js';

/** Metadata declared by one task file. */
export interface TaskMetadata {
  /** Leading digits of the filename, or null when it has none. */
  number: number | null;
  /** Filename without numeric prefix and extension. */
  name: string;
  dependencies: string[];
  softDeps: string[];
  parallelGroup?: number;
  autonomyLevel?: string;
  status?: TaskStatus;
  /** false only when frontmatter says `tracking: false`. */
  tracked: boolean;
}

// ── Frontmatter schema ───────────────────────────────────────────────

const ReferenceListSchema = z
  .union([z.array(z.union([z.string(), z.number()])), z.string()])
  .transform((value) => (typeof value === 'string' ? value.split(',') : value.map(String)))
  .transform((refs) => refs.map((ref) => ref.trim()).filter((ref) => ref !== ''))
  .catch([]);

const ParallelGroupSchema = z
  .union([z.number().int(), z.string().regex(/^\s*\d+\s*$/).transform(Number)])
  .optional()
  .catch(undefined);

const LabelSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional()
  .catch(undefined);

export const TaskFrontmatterSchema = z.object({
  fest_dependencies: ReferenceListSchema,
  fest_soft_dependencies: ReferenceListSchema,
  fest_parallel_group: ParallelGroupSchema,
  fest_autonomy: LabelSchema,
  fest_status: LabelSchema,
  tracking: z.boolean().catch(true),
});
export type TaskFrontmatter = z.infer<typeof TaskFrontmatterSchema>;

// ── Body grammar ─────────────────────────────────────────────────────

/** `Dependencies: a, b` (bold allowed), value up to the next `|` or end of line. */
const LEGACY_DEPS_RE = /(?<![\w-])\**(?<!soft[\s_-]\**)dependencies\**[ \t]*:\**[ \t]*([^|\r\n]*)/i;

/** `Autonomy: high` or `Autonomy Level: high` (bold allowed). */
const AUTONOMY_RE = /(?<![\w-])\**autonomy(?:[ \t]+level)?\**[ \t]*:\**[ \t]*([\w-]+)/i;

/**
 * Split a file into its YAML frontmatter and the remaining body.
 * Unclosed or unparsable frontmatter counts as absent.
 */
export function splitFrontmatter(content: string): { frontmatter: Record<string, unknown> | null; body: string } {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== '---') {
    return { frontmatter: null, body: content };
  }

  const closing = lines.findIndex((line, i) => i > 0 && line.trim() === '---');
  if (closing === -1) {
    return { frontmatter: null, body: content };
  }

  const body = lines.slice(closing + 1).join('\n');
  let parsed: unknown;
  try {
    parsed = parseYaml(lines.slice(1, closing).join('\n'));
  } catch {
    return { frontmatter: null, body };
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { frontmatter: null, body };
  }
  return { frontmatter: Object.fromEntries(Object.entries(parsed)), body };
}

/**
 * Number and display name from a task filename.
 * `02_build_api.md` -> `{ number: 2, name: 'build_api' }`.
 */
export function parseTaskFilename(
  filename: string,
  taskExtension = '.md',
): { number: number | null; name: string } {
  const stem = filename.toLowerCase().endsWith(taskExtension.toLowerCase())
    ? filename.slice(0, filename.length - taskExtension.length)
    : filename;

  const match = /^(\d+)/.exec(stem);
  if (!match?.[1]) {
    return { number: null, name: stem };
  }

  const name = stem.slice(match[1].length).replace(/^[\s_-]+/, '');
  return { number: parseInt(match[1], 10), name: name || stem };
}

/** Map a free-form status label onto the task status set. */
export function normalizeStatus(label: string): TaskStatus {
  switch (label.trim().toLowerCase()) {
    case 'complete':
    case 'completed':
    case 'done':
      return 'complete';
    case 'in_progress':
    case 'in-progress':
    case 'active':
      return 'in_progress';
    default:
      return 'pending';
  }
}

/** References from a legacy `Dependencies:` line; empty for `None`. */
export function parseLegacyDependencies(body: string): string[] {
  const match = LEGACY_DEPS_RE.exec(body);
  const value = match?.[1]?.trim() ?? '';
  if (value === '' || value.toLowerCase() === 'none') return [];
  return value
    .split(',')
    .map((ref) => ref.trim())
    .filter((ref) => ref !== '');
}

function unique(refs: string[]): string[] {
  return [...new Set(refs)];
}

/**
 * Extract everything the resolver needs from one task file.
 *
 * @param filePath - Used for the filename only; nothing is read from disk
 * @param content  - Raw file text
 */
export function extractTaskMetadata(
  filePath: string,
  content: string,
  taskExtension = '.md',
): TaskMetadata {
  const { number, name } = parseTaskFilename(basename(filePath), taskExtension);
  const { frontmatter, body } = splitFrontmatter(content);
  const fm = TaskFrontmatterSchema.parse(frontmatter ?? {});

  const autonomy = fm.fest_autonomy || AUTONOMY_RE.exec(body)?.[1];

  return {
    number,
    name,
    dependencies: unique([...parseLegacyDependencies(body), ...fm.fest_dependencies]),
    softDeps: unique(fm.fest_soft_dependencies),
    ...(fm.fest_parallel_group !== undefined && { parallelGroup: fm.fest_parallel_group }),
    ...(autonomy && { autonomyLevel: autonomy }),
    ...(fm.fest_status && { status: normalizeStatus(fm.fest_status) }),
    tracked: fm.tracking,
  };
}
