/**
 * Tests for festival and sequence dependency validation.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { topologicalSort } from '../algorithms.js';
import { addExplicitDependencies } from '../references.js';
import { checkReferences, validateFestival, validateSequence } from '../validate.js';
import { buildGraph, frontmatter, ids, makeTask, writeFestival } from './fixtures.js';

describe('dependency validation', () => {
  const roots: string[] = [];

  function festival(files: Record<string, string>): string {
    const root = writeFestival(files);
    roots.push(root);
    return root;
  }

  afterEach(() => {
    for (const root of roots.splice(0)) {
      rmSync(root, { recursive: true, force: true });
    }
  });

  it('reports a missing hard dependency as an error', () => {
    const root = festival({
      '001_P/01_s/01_a.md': '',
      '001_P/01_s/02_c.md': frontmatter({ fest_dependencies: '[ghost]' }),
    });

    const result = validateFestival(root);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{
      taskId: '001_P/01_s/02_c.md',
      code: 'MISSING_DEPENDENCY',
      message: 'Task c declares dependency on "ghost" which does not exist',
      severity: 'error',
    }]);
    expect(result.warnings).toEqual([]);
  });

  it('reports a missing soft dependency as a warning only', () => {
    const root = festival({
      '001_P/01_s/01_a.md': frontmatter({ fest_soft_dependencies: '[phantom]' }),
    });

    const result = validateFestival(root);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([{
      taskId: '001_P/01_s/01_a.md',
      code: 'MISSING_SOFT_DEPENDENCY',
      message: 'Task a declares soft dependency on "phantom" which does not exist',
      severity: 'warning',
    }]);
  });

  it('warns about numbering gaps without blocking the sort', () => {
    const root = festival({
      '001_P/01_s/01_a.md': '',
      '001_P/01_s/03_c.md': '',
    });

    const result = validateFestival(root);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{
      code: 'NUMBERING_GAP',
      message: `Sequence ${join(root, '001_P', '01_s')} has a gap in task numbering at position 2`,
      severity: 'warning',
    }]);

    const sorted = topologicalSort(result.graph);
    expect(sorted.ok).toBe(true);
    if (sorted.ok) expect(ids(sorted.order)).toEqual(['001_P/01_s/01_a.md', '001_P/01_s/03_c.md']);
  });

  it('reports one warning per run of missing numbers', () => {
    const root = festival({
      '001_P/01_s/02_x.md': '',
      '001_P/01_s/05_y.md': '',
      '001_P/01_s/06_z.md': '',
      '001_P/01_s/08_w.md': '',
    });

    const gaps = validateFestival(root).warnings.map((w) => w.message.split(' ').pop());
    expect(gaps).toEqual(['1', '3-4', '7']);
  });

  it('reports a huge numbering jump as a single range', () => {
    const root = festival({
      '001_P/01_s/01_a.md': '',
      '001_P/01_s/20240101_notes.md': '',
    });

    const result = validateFestival(root);

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([{
      code: 'NUMBERING_GAP',
      message: `Sequence ${join(root, '001_P', '01_s')} has a gap in task numbering at positions 2-20240100`,
      severity: 'warning',
    }]);
  });

  it('reports exactly the references left unresolved by the resolver', () => {
    const graph = buildGraph([
      makeTask('a', 1, { softDeps: ['phantom'] }),
      makeTask('b', 2, { dependencies: ['a', 'ghost'] }),
    ]);

    expect(checkReferences(graph)).toEqual({ errors: [], warnings: [] });

    addExplicitDependencies(graph);
    expect(checkReferences(graph)).toEqual({
      errors: [{
        taskId: 'b',
        code: 'MISSING_DEPENDENCY',
        message: 'Task b declares dependency on "ghost" which does not exist',
        severity: 'error',
      }],
      warnings: [{
        taskId: 'a',
        code: 'MISSING_SOFT_DEPENDENCY',
        message: 'Task a declares soft dependency on "phantom" which does not exist',
        severity: 'warning',
      }],
    });
  });

  it('skips gap warnings when disabled', () => {
    const root = festival({
      '001_P/01_s/01_a.md': '',
      '001_P/01_s/03_c.md': '',
    });
    expect(validateFestival(root, { numberingGaps: false }).warnings).toEqual([]);
  });

  it('reports a cycle with its path', () => {
    const root = festival({
      '001_P/01_s/01_a.md': frontmatter({ fest_dependencies: '[b]' }),
      '001_P/01_s/02_b.md': '',
    });

    const result = validateFestival(root);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{
      taskId: '001_P/01_s/01_a.md',
      code: 'CYCLE_DETECTED',
      message: 'Circular dependency detected: 001_P/01_s/01_a.md -> 001_P/01_s/02_b.md -> 001_P/01_s/01_a.md',
      severity: 'error',
    }]);
  });

  it('checks only cycles for a single sequence', () => {
    const root = festival({
      '001_P/01_s/01_a.md': frontmatter({ fest_dependencies: '[ghost]' }),
      '001_P/01_s/04_d.md': '',
    });

    const result = validateSequence(join(root, '001_P', '01_s'));

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.graph.size).toBe(2);
  });

  it('finds a cycle within a single sequence', () => {
    const root = festival({
      '001_P/01_s/01_a.md': frontmatter({ fest_dependencies: '[b]' }),
      '001_P/01_s/02_b.md': '',
    });

    const result = validateSequence(join(root, '001_P', '01_s'));
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['CYCLE_DETECTED']);
  });
});
