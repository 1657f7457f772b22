/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, getConfigValue, getDefaultConfig } from '../config.js';
import { FestGraphError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = [
  'FESTGRAPH_HOME',
  'FESTGRAPH_LOG_LEVEL',
  'FESTGRAPH_LOG_FILE',
  'FESTGRAPH_TASK_EXTENSION',
  'FESTGRAPH_GOAL_MARKER',
  'FESTGRAPH_NUMBERING_GAPS',
];

describe('loadConfig', () => {
  let tempDir: string;
  let festivalRoot: string;
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  async function writeJson(path: string, data: unknown): Promise<void> {
    await mkdir(join(path, '..'), { recursive: true });
    await writeFile(path, typeof data === 'string' ? data : JSON.stringify(data));
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'festgraph-config-test-'));
    festivalRoot = join(tempDir, 'festival');
    for (const key of ENV_KEYS) delete process.env[key];
    // Point to a non-existent global config
    process.env['FESTGRAPH_HOME'] = join(tempDir, 'global');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  it('returns defaults when no config files exist', async () => {
    const config = await loadConfig(festivalRoot);
    expect(config).toEqual({
      logging: { level: 'info', filePath: 'logs/festgraph.log', maxFileSize: 10 * 1024 * 1024, maxFiles: 5 },
      layout: { taskExtension: '.md', goalMarker: 'GOAL' },
      validation: { numberingGaps: true },
    });
    expect(config).toEqual(getDefaultConfig());
  });

  it('merges project config over defaults', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), {
      layout: { taskExtension: '.task' },
      validation: { numberingGaps: false },
    });
    const config = await loadConfig(festivalRoot);
    expect(config.layout.taskExtension).toBe('.task');
    expect(config.validation.numberingGaps).toBe(false);
    // Other defaults preserved
    expect(config.layout.goalMarker).toBe('GOAL');
  });

  it('layers project config over global config', async () => {
    await writeJson(join(tempDir, 'global', 'config.json'), { logging: { level: 'debug', maxFiles: 9 } });
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), { logging: { level: 'warn' } });
    const config = await loadConfig(festivalRoot);
    expect(config.logging.level).toBe('warn');
    expect(config.logging.maxFiles).toBe(9);
  });

  it('applies environment variables last', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), { logging: { level: 'warn' } });
    process.env['FESTGRAPH_LOG_LEVEL'] = 'error';
    process.env['FESTGRAPH_NUMBERING_GAPS'] = 'false';
    process.env['FESTGRAPH_GOAL_MARKER'] = 'OBJECTIVE';
    const config = await loadConfig(festivalRoot);
    expect(config.logging.level).toBe('error');
    expect(config.validation.numberingGaps).toBe(false);
    expect(config.layout.goalMarker).toBe('OBJECTIVE');
  });

  it('keeps defaults for values of the wrong type', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), {
      logging: { level: 'loud', maxFiles: 'many' },
      layout: 'flat',
    });
    const config = await loadConfig(festivalRoot);
    expect(config.logging.level).toBe('info');
    expect(config.logging.maxFiles).toBe(5);
    expect(config.layout).toEqual({ taskExtension: '.md', goalMarker: 'GOAL' });
  });

  it('falls back to default sections and flags of the wrong shape', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), {
      logging: 7,
      validation: { numberingGaps: 'no' },
      extra: true,
    });
    const config = await loadConfig(festivalRoot);
    expect(config).toEqual(getDefaultConfig());
  });

  it('rejects a config file that is not valid JSON', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), '{ not json');
    const result = loadConfig(festivalRoot);
    await expect(result).rejects.toBeInstanceOf(FestGraphError);
    await expect(result).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });

  it('rejects a config file holding a JSON array', async () => {
    await writeJson(join(festivalRoot, '.festgraph', 'config.json'), '[1, 2]');
    await expect(loadConfig(festivalRoot)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });
});

describe('getConfigValue', () => {
  let tempDir: string;
  let festivalRoot: string;
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'festgraph-config-test-'));
    festivalRoot = join(tempDir, 'festival');
    for (const key of ENV_KEYS) delete process.env[key];
    process.env['FESTGRAPH_HOME'] = join(tempDir, 'global');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  it('reports the default source', async () => {
    expect(await getConfigValue('layout.goalMarker', festivalRoot)).toEqual({ value: 'GOAL', source: 'default' });
  });

  it('reports the global source', async () => {
    await mkdir(join(tempDir, 'global'), { recursive: true });
    await writeFile(join(tempDir, 'global', 'config.json'), JSON.stringify({ logging: { maxFiles: 2 } }));
    expect(await getConfigValue('logging.maxFiles', festivalRoot)).toEqual({ value: 2, source: 'global' });
  });

  it('reports the project source', async () => {
    await mkdir(join(festivalRoot, '.festgraph'), { recursive: true });
    await writeFile(
      join(festivalRoot, '.festgraph', 'config.json'),
      JSON.stringify({ layout: { taskExtension: '.task' } }),
    );
    expect(await getConfigValue('layout.taskExtension', festivalRoot)).toEqual({ value: '.task', source: 'project' });
  });

  it('reports the env source with a parsed value', async () => {
    process.env['FESTGRAPH_NUMBERING_GAPS'] = 'true';
    expect(await getConfigValue('validation.numberingGaps')).toEqual({ value: true, source: 'env' });
  });
});
